import type {
  NewShoppingCategory,
  NewShoppingItem,
  ShoppingCategory,
  ShoppingCategoryPatch,
  ShoppingItem,
  ShoppingItemPatch,
} from "./shopping.model"

export interface ShoppingRepository {
  createCategory(input: NewShoppingCategory): Promise<ShoppingCategory>
  /** Includes the category's items. */
  findCategory(id: number): Promise<ShoppingCategory | null>
  listCategories(homeId: number): Promise<ShoppingCategory[]>
  updateCategory(id: number, patch: ShoppingCategoryPatch): Promise<ShoppingCategory>
  deleteCategory(id: number): Promise<void>

  createItem(input: NewShoppingItem): Promise<ShoppingItem>
  findItem(id: number): Promise<ShoppingItem | null>
  listItems(categoryId: number): Promise<ShoppingItem[]>
  updateItem(id: number, patch: ShoppingItemPatch): Promise<ShoppingItem>
  deleteItem(id: number): Promise<void>
}
