export type Bill = {
  id: number
  homeId: number
  billCategoryId?: number
  type: string
  payed: boolean
  paymentDate?: Date
  totalAmount: number
  periodStart: Date
  periodEnd: Date
  uploadedBy: number
  createdAt: Date
}

export type NewBill = Omit<Bill, "id" | "payed" | "paymentDate" | "createdAt">
