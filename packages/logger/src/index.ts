export * from "./interface.js";
export {getNodeLogger} from "./node.js";
export type {LoggerNodeOpts} from "./node.js";
