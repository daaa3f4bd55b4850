export { createJsonCodec } from "./codec"
