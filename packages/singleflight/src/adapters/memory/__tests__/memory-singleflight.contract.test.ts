import { describeSingleflightContract } from "../../../ports/__tests__/singleflight.contract"
import { MemorySingleflight } from "../memory-singleflight"

describeSingleflightContract("MemorySingleflight", () => new MemorySingleflight())
