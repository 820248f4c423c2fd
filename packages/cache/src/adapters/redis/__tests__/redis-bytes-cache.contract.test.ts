import { FakeClock } from "@hearth/clock"
import { describeBytesCacheContract } from "../../../ports/__tests__/bytes-cache.contract"
import { InMemoryRedisClient } from "../../../testing/in-memory-redis-client"
import { RedisBytesCache } from "../redis-bytes-cache"

describeBytesCacheContract(
  "RedisBytesCache",
  () =>
    new RedisBytesCache(new InMemoryRedisClient(new FakeClock(0)), {
      keyspacePrefix: "hearth:test:cache:",
      batchSize: 2,
    }),
)
