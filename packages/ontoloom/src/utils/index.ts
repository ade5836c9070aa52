export { generateBlankNodeId, generateId } from "./id";
export {
  attempt,
  err,
  flatMap,
  isErr,
  isOk,
  map,
  mapErr,
  ok,
  orElse,
  type Result,
  unwrap,
  unwrapOr,
} from "./result";
export { sortedJsonStringify } from "./sorted-json";
