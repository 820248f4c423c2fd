import type { SafeDataCache } from "@hearth/cache"
import { DomainAction, DomainModule, domainEvent } from "@hearth/events"
import { HouseholdKeys } from "../../../keyspace"
import type { CallOptions, DomainServiceDeps } from "../../../lib/service-deps"
import { HouseholdError } from "../../household.errors"
import type {
  BillCategory,
  BillCategoryPatch,
  NewBillCategory,
} from "../model/bill-category.model"
import type { BillCategoryRepository } from "../model/bill-category.repository"

export class BillCategoryService {
  private readonly listCache: SafeDataCache<BillCategory[]>

  constructor(private readonly deps: DomainServiceDeps<BillCategoryRepository>) {
    this.listCache = deps.cache<BillCategory[]>()
  }

  createCategory(input: NewBillCategory, opts: CallOptions = {}): Promise<BillCategory> {
    return this.deps.coordinator.mutate(
      {
        name: "createBillCategory",
        invalidate: () => [HouseholdKeys.billCategoriesForHome(input.homeId)],
        write: () => this.deps.repository.create(input),
        event: (category) =>
          domainEvent(DomainModule.BillCategory, DomainAction.Created, category),
      },
      opts,
    )
  }

  /** A home without categories is read from the repository every time. */
  getCategories(homeId: number, opts: CallOptions = {}): Promise<BillCategory[]> {
    return this.deps.coordinator.read(
      this.listCache,
      HouseholdKeys.billCategoriesForHome(homeId),
      () => this.deps.repository.listForHome(homeId),
      { ...opts, shouldCache: (categories) => categories.length > 0 },
    )
  }

  updateCategory(
    id: number,
    patch: BillCategoryPatch,
    opts: CallOptions = {},
  ): Promise<BillCategory> {
    return this.deps.coordinator.mutate(
      {
        name: "updateBillCategory",
        resolve: async () => {
          const category = await this.deps.repository.findById(id)
          if (category === null) throw HouseholdError.billCategoryNotFound(id)
          return category
        },
        invalidate: (category) => [HouseholdKeys.billCategoriesForHome(category.homeId)],
        write: () => this.deps.repository.update(id, patch),
        event: (category) =>
          domainEvent(DomainModule.BillCategory, DomainAction.Updated, category),
      },
      opts,
    )
  }

  deleteCategory(id: number, homeId: number, opts: CallOptions = {}): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "deleteBillCategory",
        invalidate: () => [HouseholdKeys.billCategoriesForHome(homeId)],
        write: () => this.deps.repository.delete(id),
        event: () => domainEvent(DomainModule.BillCategory, DomainAction.Deleted, { id }),
      },
      opts,
    )
  }
}
