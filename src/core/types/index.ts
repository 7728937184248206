export {
  type Brand,
  type UserId,
  type RequestId,
  type Timestamp,
  brand,
  toUserId,
  toTimestamp,
} from "./brand.js";
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  flatMap,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export {
  type CursorParams,
  type PaginatedResult,
  encodeCursor,
  decodeCursor,
} from "./pagination.js";
