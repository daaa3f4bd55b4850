import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: async () => ({
    source: new ObjectSource({ LOG_LEVEL: "warn" }, "test"),
  }),
  setup: async () => {},
  expectedName: "object:test",
  expectedValue: () => ({ LOG_LEVEL: "warn" }),
})
