import type {S3Config} from "../config/types.js";
import {CommandError, CommandErrorCode} from "./errors.js";

export type S3FieldName = "s3-bucket" | "s3-bucket-key-prefix" | "access-key" | "secret-key" | "region";

type S3FieldRule = {
  name: S3FieldName;
  /** Must be set as soon as any S3 field is set */
  required: boolean;
  value: (s3: S3Config) => string;
};

/** Checked and reported in this order */
export const s3FieldRules: S3FieldRule[] = [
  {name: "s3-bucket", required: true, value: (s3) => s3.bucket},
  {name: "s3-bucket-key-prefix", required: false, value: (s3) => s3.bucketKeyPrefix},
  {name: "access-key", required: true, value: (s3) => s3.accessKey},
  {name: "secret-key", required: true, value: (s3) => s3.secretKey},
  {name: "region", required: true, value: (s3) => s3.region},
];

/**
 * True if any S3 field is set, in which case the S3 store is in use
 */
export function isS3ConfigInUse(s3: S3Config): boolean {
  return s3FieldRules.some((rule) => rule.value(s3) !== "");
}

/**
 * Names of the required S3 fields left empty while the S3 store is in use.
 * Empty if the S3 store is not in use or fully configured.
 */
export function getMissingS3Fields(s3: S3Config): S3FieldName[] {
  if (!isS3ConfigInUse(s3)) {
    return [];
  }

  return s3FieldRules.filter((rule) => rule.required && rule.value(s3) === "").map((rule) => rule.name);
}

export function validateS3Config(s3: S3Config): void {
  const missingFields = getMissingS3Fields(s3);
  if (missingFields.length > 0) {
    throw new CommandError(
      {code: CommandErrorCode.INCOMPLETE_S3_CONFIG, missingFields},
      `${missingFields.join(", ")} must be specified when using s3 storage`
    );
  }
}
