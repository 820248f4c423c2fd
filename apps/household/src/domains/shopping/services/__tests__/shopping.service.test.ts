import { createTestHarness, type TestHarness } from "../../../../tests/test-harness"
import type { ShoppingService } from "../shopping.service"

describe("ShoppingService", () => {
  let h: TestHarness
  let shopping: ShoppingService

  beforeEach(async () => {
    h = await createTestHarness()
    shopping = h.ctx.services.shopping
  })

  it("caches a category together with its items", async () => {
    const category = await shopping.createCategory({
      homeId: 7,
      name: "Groceries",
      color: "#33cc33",
    })
    const item = await shopping.createItem({
      categoryId: category.id,
      addedBy: 2,
      name: "Oat milk",
    })

    const loaded = await shopping.getCategory(category.id, 7)

    expect(loaded.items).toEqual([item])
    expect(h.cachedKeys()).toEqual(["shopping-category:1"])
  })

  it("refuses a category read from another home, even from the cache", async () => {
    const category = await shopping.createCategory({
      homeId: 7,
      name: "Groceries",
      color: "#33cc33",
    })
    await shopping.getCategory(category.id, 7)

    await expect(shopping.getCategory(category.id, 8)).rejects.toMatchObject({
      code: "category_not_in_home",
    })
  })

  it("drops the containing category when an item is bought", async () => {
    const category = await shopping.createCategory({
      homeId: 7,
      name: "Groceries",
      color: "#33cc33",
    })
    const item = await shopping.createItem({
      categoryId: category.id,
      addedBy: 2,
      name: "Oat milk",
    })
    await shopping.getCategory(category.id, 7)
    await shopping.getCategoriesForHome(7)

    const bought = await shopping.markBought(item.id)

    expect(bought).toMatchObject({
      isBought: true,
      boughtDate: new Date("2024-05-01T09:00:00.000Z"),
    })
    expect(h.cachedKeys()).toEqual(["shopping-categories:home:7"])
    expect(h.published().at(-1)).toMatchObject({
      module: "SHOPPING_ITEM",
      action: "UPDATED",
      data: { id: item.id, isBought: true, boughtDate: "2024-05-01T09:00:00.000Z" },
    })
    expect((await shopping.getCategory(category.id, 7)).items).toEqual([bought])
  })

  it("rejects items for a category that does not exist", async () => {
    const create = shopping.createItem({ categoryId: 12, addedBy: 2, name: "Bread" })

    await expect(create).rejects.toMatchObject({ code: "shopping_category_not_found" })
    expect(h.published()).toEqual([])
  })

  it("edits and deletes a category scoped to its home", async () => {
    const category = await shopping.createCategory({
      homeId: 7,
      name: "Groceries",
      color: "#33cc33",
    })

    await expect(shopping.editCategory(category.id, 8, { name: "Food" })).rejects.toMatchObject({
      code: "category_not_in_home",
    })
    const edited = await shopping.editCategory(category.id, 7, { name: "Food" })
    await shopping.deleteCategory(category.id, 7)

    expect(edited.name).toBe("Food")
    expect(h.published().map((e) => `${e.module}/${e.action}`)).toEqual([
      "SHOPPING_CATEGORY/CREATED",
      "SHOPPING_CATEGORY/UPDATED",
      "SHOPPING_CATEGORY/DELETED",
    ])
    expect(await shopping.getCategoriesForHome(7)).toEqual([])
  })

  it("announces the deleted item itself", async () => {
    const category = await shopping.createCategory({
      homeId: 7,
      name: "Groceries",
      color: "#33cc33",
    })
    const item = await shopping.createItem({
      categoryId: category.id,
      addedBy: 2,
      name: "Oat milk",
    })

    const deleted = await shopping.deleteItem(item.id)

    expect(deleted).toEqual(item)
    expect(h.published().at(-1)).toMatchObject({
      module: "SHOPPING_ITEM",
      action: "DELETED",
      data: { id: item.id },
    })
    await expect(shopping.getItem(item.id)).rejects.toMatchObject({
      code: "shopping_item_not_found",
    })
  })
})
