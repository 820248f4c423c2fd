import type {
  BillCategory,
  BillCategoryPatch,
  NewBillCategory,
} from "./bill-category.model"

export interface BillCategoryRepository {
  create(input: NewBillCategory): Promise<BillCategory>
  findById(id: number): Promise<BillCategory | null>
  listForHome(homeId: number): Promise<BillCategory[]>
  update(id: number, patch: BillCategoryPatch): Promise<BillCategory>
  delete(id: number): Promise<void>
}
