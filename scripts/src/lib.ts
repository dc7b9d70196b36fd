export * from "./arrays.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./files.js";
export * from "./images.js";
export * from "./json.js";
export * from "./logging.js";
export * from "./s3.js";
export * from "./status.js";
export * from "./strings.js";
export * from "./utils.js";
