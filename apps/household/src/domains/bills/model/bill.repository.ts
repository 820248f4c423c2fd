import type { Bill, NewBill } from "./bill.model"

export interface BillRepository {
  create(input: NewBill): Promise<Bill>
  findById(id: number): Promise<Bill | null>
  listForHome(homeId: number): Promise<Bill[]>
  delete(id: number): Promise<void>
  markPaid(id: number, paidAt: Date): Promise<Bill>
}
