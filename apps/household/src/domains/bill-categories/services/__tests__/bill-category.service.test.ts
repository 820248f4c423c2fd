import { createTestHarness, type TestHarness } from "../../../../tests/test-harness"
import type { BillCategoryService } from "../bill-category.service"

describe("BillCategoryService", () => {
  let h: TestHarness
  let categories: BillCategoryService

  beforeEach(async () => {
    h = await createTestHarness()
    categories = h.ctx.services.billCategories
  })

  it("does not cache an empty category list", async () => {
    expect(await categories.getCategories(7)).toEqual([])
    expect(h.cachedKeys()).toEqual([])
  })

  it("caches a non-empty list until a category changes", async () => {
    const category = await categories.createCategory({
      homeId: 7,
      name: "Utilities",
      color: "#ffaa00",
    })
    await categories.getCategories(7)
    expect(h.cachedKeys()).toEqual(["bill-categories:home:7"])

    const updated = await categories.updateCategory(category.id, { color: "#00aaff" })

    expect(updated.color).toBe("#00aaff")
    expect(h.cachedKeys()).toEqual([])
    expect(h.published().map((e) => `${e.module}/${e.action}`)).toEqual([
      "BILL_CATEGORY/CREATED",
      "BILL_CATEGORY/UPDATED",
    ])
  })

  it("rejects updates to unknown categories", async () => {
    await expect(categories.updateCategory(3, { name: "Rent" })).rejects.toMatchObject({
      code: "bill_category_not_found",
    })
  })

  it("announces deletions by id", async () => {
    const category = await categories.createCategory({
      homeId: 7,
      name: "Utilities",
      color: "#ffaa00",
    })

    await categories.deleteCategory(category.id, 7)

    expect(h.published().at(-1)).toEqual({
      module: "BILL_CATEGORY",
      action: "DELETED",
      data: { id: category.id },
    })
    expect(await categories.getCategories(7)).toEqual([])
  })
})
