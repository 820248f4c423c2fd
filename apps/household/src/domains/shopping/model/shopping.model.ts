export type ShoppingItem = {
  id: number
  categoryId: number
  name: string
  addedBy: number
  isBought: boolean
  image?: string
  link?: string
  boughtDate?: Date
  createdAt: Date
}

export type ShoppingCategory = {
  id: number
  homeId: number
  name: string
  icon?: string
  color: string
  createdAt: Date
  /** Present when loaded as a single category. */
  items?: ShoppingItem[]
}

export type NewShoppingCategory = {
  homeId: number
  name: string
  icon?: string
  color: string
}

export type ShoppingCategoryPatch = Partial<
  Pick<ShoppingCategory, "name" | "icon" | "color">
>

export type NewShoppingItem = {
  categoryId: number
  addedBy: number
  name: string
  image?: string
  link?: string
}

export type ShoppingItemPatch = Partial<
  Pick<ShoppingItem, "name" | "image" | "link" | "isBought" | "boughtDate">
>
