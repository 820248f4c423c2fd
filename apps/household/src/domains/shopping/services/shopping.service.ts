import type { SafeDataCache } from "@hearth/cache"
import type { TimeSource } from "@hearth/clock"
import { DomainAction, DomainModule, domainEvent } from "@hearth/events"
import { HouseholdKeys } from "../../../keyspace"
import type { CallOptions, DomainServiceDeps } from "../../../lib/service-deps"
import { HouseholdError } from "../../household.errors"
import type {
  NewShoppingCategory,
  NewShoppingItem,
  ShoppingCategory,
  ShoppingCategoryPatch,
  ShoppingItem,
  ShoppingItemPatch,
} from "../model/shopping.model"
import type { ShoppingRepository } from "../model/shopping.repository"

export type ShoppingServiceDeps = DomainServiceDeps<ShoppingRepository> & {
  clock: TimeSource
}

/**
 * Categories are cached singly (with their items) and per home. Items have no
 * entries of their own; item writes drop the entry of the category they sit in.
 */
export class ShoppingService {
  private readonly categoryCache: SafeDataCache<ShoppingCategory>
  private readonly categoryListCache: SafeDataCache<ShoppingCategory[]>

  constructor(private readonly deps: ShoppingServiceDeps) {
    this.categoryCache = deps.cache<ShoppingCategory>()
    this.categoryListCache = deps.cache<ShoppingCategory[]>()
  }

  createCategory(
    input: NewShoppingCategory,
    opts: CallOptions = {},
  ): Promise<ShoppingCategory> {
    return this.deps.coordinator.mutate(
      {
        name: "createShoppingCategory",
        invalidate: () => [HouseholdKeys.shoppingCategoriesForHome(input.homeId)],
        write: () => this.deps.repository.createCategory(input),
        event: (category) =>
          domainEvent(DomainModule.ShoppingCategory, DomainAction.Created, category),
      },
      opts,
    )
  }

  getCategoriesForHome(
    homeId: number,
    opts: CallOptions = {},
  ): Promise<ShoppingCategory[]> {
    return this.deps.coordinator.read(
      this.categoryListCache,
      HouseholdKeys.shoppingCategoriesForHome(homeId),
      () => this.deps.repository.listCategories(homeId),
      opts,
    )
  }

  async getCategory(
    id: number,
    homeId: number,
    opts: CallOptions = {},
  ): Promise<ShoppingCategory> {
    const category = await this.deps.coordinator.read(
      this.categoryCache,
      HouseholdKeys.shoppingCategory(id),
      () => this.findCategory(id),
      opts,
    )

    if (category.homeId !== homeId) throw HouseholdError.categoryNotInHome(id, homeId)
    return category
  }

  editCategory(
    id: number,
    homeId: number,
    patch: ShoppingCategoryPatch,
    opts: CallOptions = {},
  ): Promise<ShoppingCategory> {
    return this.deps.coordinator.mutate(
      {
        name: "editShoppingCategory",
        resolve: () => this.findCategoryInHome(id, homeId),
        invalidate: () => this.categoryKeys(id, homeId),
        write: () => this.deps.repository.updateCategory(id, patch),
        event: (category) =>
          domainEvent(DomainModule.ShoppingCategory, DomainAction.Updated, category),
      },
      opts,
    )
  }

  deleteCategory(id: number, homeId: number, opts: CallOptions = {}): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "deleteShoppingCategory",
        resolve: () => this.findCategoryInHome(id, homeId),
        invalidate: () => this.categoryKeys(id, homeId),
        write: () => this.deps.repository.deleteCategory(id),
        event: () =>
          domainEvent(DomainModule.ShoppingCategory, DomainAction.Deleted, { id }),
      },
      opts,
    )
  }

  createItem(input: NewShoppingItem, opts: CallOptions = {}): Promise<ShoppingItem> {
    return this.deps.coordinator.mutate(
      {
        name: "createShoppingItem",
        resolve: () => this.findCategory(input.categoryId),
        invalidate: (category) => [HouseholdKeys.shoppingCategory(category.id)],
        write: () => this.deps.repository.createItem(input),
        event: (item) =>
          domainEvent(DomainModule.ShoppingItem, DomainAction.Created, item),
      },
      opts,
    )
  }

  getItem(id: number): Promise<ShoppingItem> {
    return this.findItem(id)
  }

  getItemsForCategory(categoryId: number): Promise<ShoppingItem[]> {
    return this.deps.repository.listItems(categoryId)
  }

  deleteItem(id: number, opts: CallOptions = {}): Promise<ShoppingItem> {
    return this.deps.coordinator.mutate(
      {
        name: "deleteShoppingItem",
        resolve: () => this.findItem(id),
        invalidate: (item) => [HouseholdKeys.shoppingCategory(item.categoryId)],
        write: async (item) => {
          await this.deps.repository.deleteItem(item.id)
          return item
        },
        event: (item) =>
          domainEvent(DomainModule.ShoppingItem, DomainAction.Deleted, item),
      },
      opts,
    )
  }

  markBought(id: number, opts: CallOptions = {}): Promise<ShoppingItem> {
    return this.updateItem(
      "markShoppingItemBought",
      id,
      { isBought: true, boughtDate: this.deps.clock.now() },
      opts,
    )
  }

  editItem(
    id: number,
    patch: ShoppingItemPatch,
    opts: CallOptions = {},
  ): Promise<ShoppingItem> {
    return this.updateItem("editShoppingItem", id, patch, opts)
  }

  private updateItem(
    name: string,
    id: number,
    patch: ShoppingItemPatch,
    opts: CallOptions,
  ): Promise<ShoppingItem> {
    return this.deps.coordinator.mutate(
      {
        name,
        resolve: () => this.findItem(id),
        invalidate: (item) => [HouseholdKeys.shoppingCategory(item.categoryId)],
        write: (item) => this.deps.repository.updateItem(item.id, patch),
        event: (item) =>
          domainEvent(DomainModule.ShoppingItem, DomainAction.Updated, item),
      },
      opts,
    )
  }

  private categoryKeys(id: number, homeId: number): string[] {
    return [
      HouseholdKeys.shoppingCategory(id),
      HouseholdKeys.shoppingCategoriesForHome(homeId),
    ]
  }

  private async findCategoryInHome(
    id: number,
    homeId: number,
  ): Promise<ShoppingCategory> {
    const category = await this.findCategory(id)
    if (category.homeId !== homeId) throw HouseholdError.categoryNotInHome(id, homeId)
    return category
  }

  private async findCategory(id: number): Promise<ShoppingCategory> {
    const category = await this.deps.repository.findCategory(id)
    if (category === null) throw HouseholdError.shoppingCategoryNotFound(id)
    return category
  }

  private async findItem(id: number): Promise<ShoppingItem> {
    const item = await this.deps.repository.findItem(id)
    if (item === null) throw HouseholdError.shoppingItemNotFound(id)
    return item
  }
}
