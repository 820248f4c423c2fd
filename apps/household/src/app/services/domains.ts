import {
  type BytesCache,
  CodecDataCache,
  createJsonCodec,
  createMemoryBytesCache,
  RedisBytesCache,
  SafeDataCache,
  Ttl,
} from "@hearth/cache"
import { CacheAsideCoordinator } from "@hearth/cache-aside"
import { ChannelEventPublisher } from "@hearth/events"
import type { Logger } from "@hearth/logger"
import { BillCategoryService } from "../../domains/bill-categories/services/bill-category.service"
import { BillService } from "../../domains/bills/services/bill.service"
import { HomeService } from "../../domains/homes/services/home.service"
import { NotificationService } from "../../domains/notifications/services/notification.service"
import { PollService } from "../../domains/polls/services/poll.service"
import type { HouseholdRepositories } from "../../domains/repositories"
import { RoomService } from "../../domains/rooms/services/room.service"
import { ShoppingService } from "../../domains/shopping/services/shopping.service"
import { TaskService } from "../../domains/tasks/services/task.service"
import { UserService } from "../../domains/users/services/user.service"
import type { TypedCacheFactory } from "../../lib/service-deps"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  homes: HomeService
  tasks: TaskService
  bills: BillService
  billCategories: BillCategoryService
  polls: PollService
  rooms: RoomService
  shopping: ShoppingService
  notifications: NotificationService
  users: UserService
}

export type DomainModuleName = keyof DomainServices

export function createDomainServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
  repositories: HouseholdRepositories,
): DomainServices {
  const store = createBytesStore(config, core, infra)

  const publisher = new ChannelEventPublisher(
    { channel: infra.eventChannel, logger: core.logger.child({ module: "events" }) },
    {
      channelName: config.events.channel,
      publishTimeoutMs: config.events.publishTimeoutMs,
    },
  )

  const wiring = (module: DomainModuleName) => {
    const logger = core.logger.child({ module })
    const cache = typedCacheFactory(store, logger, config)

    return {
      cache,
      coordinator: new CacheAsideCoordinator({
        invalidator: cache<unknown>(),
        publisher,
        logger,
      }),
    }
  }

  return {
    homes: new HomeService({ repository: repositories.homes, ...wiring("homes") }),
    tasks: new TaskService({
      repository: repositories.tasks,
      clock: core.clock,
      ...wiring("tasks"),
    }),
    bills: new BillService({
      repository: repositories.bills,
      clock: core.clock,
      ...wiring("bills"),
    }),
    billCategories: new BillCategoryService({
      repository: repositories.billCategories,
      ...wiring("billCategories"),
    }),
    polls: new PollService({ repository: repositories.polls, ...wiring("polls") }),
    rooms: new RoomService({ repository: repositories.rooms, ...wiring("rooms") }),
    shopping: new ShoppingService({
      repository: repositories.shopping,
      clock: core.clock,
      ...wiring("shopping"),
    }),
    notifications: new NotificationService({
      repository: repositories.notifications,
      ...wiring("notifications"),
    }),
    users: new UserService({
      repository: repositories.users,
      coordinator: wiring("users").coordinator,
    }),
  }
}

function createBytesStore(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): BytesCache {
  if (config.cache.driver === "memory") {
    return createMemoryBytesCache({ ...config.cache.memory, clock: core.clock })
  }

  return new RedisBytesCache(infra.redisClient, {
    batchSize: config.cache.batchSize,
    keyspacePrefix: `${config.redis.keyPrefix}:cache:`,
  })
}

function typedCacheFactory(
  store: BytesCache,
  logger: Logger,
  config: AppConfig,
): TypedCacheFactory {
  const opts = {
    defaultTtl: Ttl.seconds(config.cache.ttlSeconds),
    opTimeoutMs: config.cache.opTimeoutMs,
  }

  return <T>() =>
    new SafeDataCache<T>(
      { cache: new CodecDataCache(store, createJsonCodec<T>()), logger },
      opts,
    )
}
