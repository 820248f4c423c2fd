export type BillCategory = {
  id: number
  homeId: number
  name: string
  color: string
  createdAt: Date
}

export type NewBillCategory = Pick<BillCategory, "homeId" | "name" | "color">

export type BillCategoryPatch = Partial<Pick<BillCategory, "name" | "color">>
