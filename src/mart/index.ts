export { MartService, type MartServiceOptions } from "./service.js";
export { createMartService, type CreateMartServiceOptions } from "./factory.js";
export {
  parseDatasetReference,
  parseFetchDataRequest,
  SelectionRequestError,
  type DatasetReference,
  type FetchDataRequest,
  type ParsedDatasetReference,
  type ParsedFetchDataRequest,
} from "./request.js";
