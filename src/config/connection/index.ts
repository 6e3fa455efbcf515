export {
  MartConnectionSchema,
  type MartConnection,
  type MartConnectionOverrides,
} from "./schema.js";
export { DEFAULT_MART_CONNECTION } from "./defaults.js";
export {
  loadConnectionConfig,
  martServiceUrl,
  ConnectionConfigError,
  type ConnectionConfigIssue,
} from "./loader.js";
