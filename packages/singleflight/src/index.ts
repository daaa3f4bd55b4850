export { MemorySingleflight } from "./adapters/memory/memory-singleflight"
export type {
  FlightResult,
  FlightSource,
  InFlightKey,
  Singleflight,
} from "./ports/singleflight"
