import { z } from "zod"
import { InvalidCacheConfigError } from "../../errors/errors"
import { cacheEnvSchema } from "../cache-env-schema"
import { EnvSource } from "../env-source"
import { loadConfig } from "../load-config"
import { ObjectSource } from "../object-source"

describe("loadConfig", () => {
  describe("cacheEnvSchema", () => {
    it("reads LRU_-prefixed variables and applies defaults", async () => {
      const config = await loadConfig({
        schema: cacheEnvSchema,
        sources: [new EnvSource({ env: { LRU_NAMESPACE: "users", LRU_MAX_SIZE: "500" } })],
      })

      expect(config.value).toStrictEqual({
        REDIS_URL: "redis://localhost:6379",
        KEYSPACE_PREFIX: "lru:",
        NAMESPACE: "users",
        MAX_SIZE: 500,
        EXPIRATION_MODE: "write",
        LOG_LEVEL: "info",
      })
    })

    it("coerces expiration seconds", async () => {
      const config = await loadConfig({
        schema: cacheEnvSchema,
        sources: [
          new EnvSource({
            env: {
              LRU_NAMESPACE: "users",
              LRU_MAX_SIZE: "10",
              LRU_EXPIRATION_SECONDS: "2.5",
              LRU_EXPIRATION_MODE: "access",
            },
          }),
        ],
      })

      expect(config.value.EXPIRATION_SECONDS).toBe(2.5)
      expect(config.value.EXPIRATION_MODE).toBe("access")
    })

    it("rejects an invalid MAX_SIZE with the field name", async () => {
      const load = loadConfig({
        schema: cacheEnvSchema,
        sources: [new EnvSource({ env: { LRU_NAMESPACE: "users", LRU_MAX_SIZE: "many" } })],
      })

      await expect(load).rejects.toBeInstanceOf(InvalidCacheConfigError)
      await expect(load).rejects.toThrow(/MAX_SIZE/)
    })

    it("rejects an unknown log level", async () => {
      await expect(
        loadConfig({
          schema: cacheEnvSchema,
          sources: [
            new ObjectSource({ NAMESPACE: "users", MAX_SIZE: 1, LOG_LEVEL: "verbose" }),
          ],
        }),
      ).rejects.toThrow(InvalidCacheConfigError)
    })
  })

  describe("sources", () => {
    const schema = z.object({
      MAX_SIZE: z.coerce.number(),
      NAMESPACE: z.string(),
      KEYSPACE_PREFIX: z.string().default("lru:"),
    })

    it("later sources override earlier ones", async () => {
      const config = await loadConfig({
        schema,
        sources: [
          new ObjectSource({ MAX_SIZE: 100, NAMESPACE: "base" }),
          new EnvSource({ env: { LRU_MAX_SIZE: "200" } }),
        ],
      })

      expect(config.value.MAX_SIZE).toBe(200)
      expect(config.value.NAMESPACE).toBe("base")
    })

    it("undefined values do not override defined ones", async () => {
      const config = await loadConfig({
        schema,
        sources: [
          new ObjectSource({ MAX_SIZE: 100, NAMESPACE: "base" }),
          new EnvSource({ env: { LRU_MAX_SIZE: undefined } }),
        ],
      })

      expect(config.value.MAX_SIZE).toBe(100)
    })

    it("explains where each value came from", async () => {
      const config = await loadConfig({
        schema,
        sources: [
          new ObjectSource({ NAMESPACE: "base" }),
          new EnvSource({ env: { LRU_MAX_SIZE: "200" } }),
        ],
      })

      expect(config.explain("MAX_SIZE")).toBe("env")
      expect(config.explain("NAMESPACE")).toBe("object:overrides")
      expect(config.explain("KEYSPACE_PREFIX")).toBe("default")
      expect(config.sourcesUsed()).toStrictEqual(["object:overrides", "env", "default"])
    })

    it("reports keys the schema does not know", async () => {
      const config = await loadConfig({
        schema,
        sources: [new EnvSource({ env: { LRU_MAX_SIZE: "1", LRU_NAMESPACE: "n", LRU_MAXSIZE: "2" } })],
      })

      expect(config.unknownKeys()).toStrictEqual(["MAXSIZE"])
    })

    it("ignores variables without the prefix", async () => {
      const config = await loadConfig({
        schema,
        sources: [
          new EnvSource({ env: { LRU_MAX_SIZE: "1", LRU_NAMESPACE: "n", PATH: "/usr/bin" } }),
        ],
      })

      expect(config.unknownKeys()).toStrictEqual([])
    })

    it("an empty prefix reads every variable", async () => {
      const config = await loadConfig({
        schema,
        sources: [new EnvSource({ prefix: "", env: { MAX_SIZE: "3", NAMESPACE: "n" } })],
      })

      expect(config.value.MAX_SIZE).toBe(3)
    })

    it("reads process.env with the LRU_ prefix by default", async () => {
      vi.stubEnv("LRU_NAMESPACE", "from-process")
      vi.stubEnv("LRU_MAX_SIZE", "7")

      try {
        const config = await loadConfig({ schema })

        expect(config.value.NAMESPACE).toBe("from-process")
        expect(config.value.MAX_SIZE).toBe(7)
      } finally {
        vi.unstubAllEnvs()
      }
    })

    it("freezes the loaded values", async () => {
      const config = await loadConfig({
        schema,
        sources: [new ObjectSource({ MAX_SIZE: 1, NAMESPACE: "n" })],
      })

      expect(Object.isFrozen(config.value)).toBe(true)
    })
  })
})
