import { CacheError } from "../cache-error"
import { KeyNotFoundError } from "../errors"
import { isCacheError } from "../is-cache-error"

describe("isCacheError", () => {
  it("accepts cache errors and their subclasses", () => {
    expect(isCacheError(new CacheError("x", { code: "invalid_config" }))).toBe(true)
    expect(isCacheError(new KeyNotFoundError("ns", "k"))).toBe(true)
  })

  it("accepts a serialized-and-revived shape with a known code", () => {
    const revived = {
      name: "StoreUnavailableError",
      message: "down",
      code: "store_unavailable",
      context: {},
      isRetryable: true,
      isOperational: true,
      timestamp: new Date(),
    }

    expect(isCacheError(revived)).toBe(true)
  })

  it.each([
    ["null", null],
    ["a string", "key_not_found"],
    ["a plain Error", new Error("x")],
    [
      "an error shape with a foreign code",
      {
        name: "E",
        message: "m",
        code: "not_ours",
        context: {},
        isRetryable: false,
        isOperational: true,
        timestamp: new Date(),
      },
    ],
    [
      "an error shape with an invalid timestamp",
      {
        name: "E",
        message: "m",
        code: "key_not_found",
        context: {},
        isRetryable: false,
        isOperational: true,
        timestamp: new Date(Number.NaN),
      },
    ],
  ])("rejects %s", (_label, value) => {
    expect(isCacheError(value)).toBe(false)
  })
})
