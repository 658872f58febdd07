/**
 * Library entry point for gallery-upload.
 *
 * The command-line tool lives in `cli/upload.ts`; everything it is built
 * from is exported here for programmatic use.
 */

export * from "./sites/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./description/index.js";
export * from "./story/index.js";
export {
  parseUploadArgs,
  validateUploadArgs,
  runUpload,
  describeKnownError,
  UploadArgumentError,
  EmptySourceError,
  type UploadArgs,
  type UploadDependencies,
  type UploadSummary,
} from "./cli/upload.js";
