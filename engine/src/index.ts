/**
 * answerkit Engine — Public API
 *
 * This is the single entry point for the engine package.
 * CLI and backend import from here — never from internal modules.
 */

// Opening & persistence
export {
  createAnswerDocument,
  parseAnswerDocument,
  loadAnswerDocument,
  openAnswerFile,
} from "./answer-file/document";
export {
  serializeAnswerDocument,
  saveAnswerDocument,
  XML_DECLARATION,
  DEFAULT_NEWLINE,
} from "./answer-file/writer";

// Namespace-aware accessor
export {
  ensureRoot,
  findChild,
  findChildren,
  findOrCreateChild,
  findPass,
  findOrCreatePass,
  findComponent,
  findOrCreateComponent,
  childText,
  setChildText,
  COMPONENT_ATTRIBUTES,
  SHELL_SETUP,
  DEPLOYMENT,
} from "./answer-file/accessor";
export { NAMESPACES, namespaceUri } from "./answer-file/namespaces";
export type { Namespace } from "./answer-file/namespaces";

// Ordered commands & bootstrap
export {
  nextOrder,
  appendOrderedCommand,
  listOrderedCommands,
} from "./answer-file/ordered-commands";
export {
  injectBootstrap,
  listInjectedCommands,
  buildCopyScriptCommand,
  buildSecondStageCommand,
  secondStageScriptPath,
  DEFAULT_INSTALLED_ANSWER_FILE,
} from "./answer-file/bootstrap";

// Extension data & identity
export {
  setCopyScript,
  getCopyScript,
  setUserInput,
  getUserInput,
  redactUserInput,
  USER_INPUT_DENYLIST,
} from "./answer-file/extension-store";
export {
  setDeviceName,
  getDeviceName,
  setLocalAccount,
  listLocalAccounts,
  encodeAccountPassword,
  ADMINISTRATORS_GROUP,
} from "./answer-file/identity";

// Errors & validation
export { AnswerFileError, errorMessage } from "./answer-file/errors";
export { FolderNameSchema, UserInputSchema } from "./answer-file/validation";

// Media preparation
export {
  prepareAnswerFile,
  resolveMediaPaths,
  ANSWER_FILE_NAME,
  COPY_SCRIPT_NAME,
} from "./media";

// Logging
export { createLogger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";

// All types
export type {
  PassName,
  ComponentName,
  CommandField,
  OrderedCommand,
  OrderedCommandInput,
  LocalAccountInfo,
  UserInputFields,
  AnswerFile,
  OpenAnswerFileOptions,
  AnswerFileErrorCategory,
  AnswerFileFailure,
  MutationResult,
  BootstrapOptions,
  BootstrapOrders,
  InjectedCommands,
  MediaLayout,
  MediaPaths,
  PrepareOptions,
  PreparedAnswerFile,
} from "./types";
