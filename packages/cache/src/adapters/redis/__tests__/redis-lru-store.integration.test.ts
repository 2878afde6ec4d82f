import { describeLruStoreContract } from "../../../ports/__tests__/lru-store.contract"
import { createRedisTestClient } from "../../../tests/utils/create-redis-test-client"
import { deleteKeysByPrefix } from "../../../tests/utils/delete-keys-by-prefix"
import { SLOW_TEST_TAG, sleep } from "../../../tests/utils/sleep"
import type { RedisBytesClient } from "../redis-client"
import { RedisLruStore } from "../redis-lru-store"

describe.skipIf(!process.env.REDIS_URL)(`RedisLruStore against Redis ${SLOW_TEST_TAG}`, () => {
  let client: RedisBytesClient
  let keyspacePrefix: string
  let counter = 0

  beforeAll(async () => {
    const redisTestClient = createRedisTestClient()

    client = redisTestClient.client
    keyspacePrefix = redisTestClient.keyspacePrefix

    await client.connect()
  })

  afterAll(async () => {
    await deleteKeysByPrefix(client, keyspacePrefix)
    await client.quit()
  })

  describeLruStoreContract("RedisLruStore", () => {
    counter += 1

    return {
      store: new RedisLruStore(client, { keyspacePrefix }),
      namespace: `ns-${counter}`,
      elapse: (ms) => sleep(ms + 20),
    }
  })
})
