import type { SafeDataCache } from "@hearth/cache"
import type { TimeSource } from "@hearth/clock"
import { DomainAction, DomainModule, domainEvent } from "@hearth/events"
import { HouseholdKeys } from "../../../keyspace"
import type { CallOptions, DomainServiceDeps } from "../../../lib/service-deps"
import { HouseholdError } from "../../household.errors"
import type { Bill, NewBill } from "../model/bill.model"
import type { BillRepository } from "../model/bill.repository"

export type BillServiceDeps = DomainServiceDeps<BillRepository> & {
  clock: TimeSource
}

export class BillService {
  private readonly billCache: SafeDataCache<Bill>
  private readonly billListCache: SafeDataCache<Bill[]>

  constructor(private readonly deps: BillServiceDeps) {
    this.billCache = deps.cache<Bill>()
    this.billListCache = deps.cache<Bill[]>()
  }

  createBill(input: NewBill, opts: CallOptions = {}): Promise<Bill> {
    return this.deps.coordinator.mutate(
      {
        name: "createBill",
        invalidate: () => [HouseholdKeys.billsForHome(input.homeId)],
        write: () => this.deps.repository.create(input),
        event: (bill) => domainEvent(DomainModule.Bill, DomainAction.Created, bill),
      },
      opts,
    )
  }

  getBill(id: number, opts: CallOptions = {}): Promise<Bill> {
    return this.deps.coordinator.read(
      this.billCache,
      HouseholdKeys.bill(id),
      () => this.findBill(id),
      opts,
    )
  }

  getBillsForHome(homeId: number, opts: CallOptions = {}): Promise<Bill[]> {
    return this.deps.coordinator.read(
      this.billListCache,
      HouseholdKeys.billsForHome(homeId),
      () => this.deps.repository.listForHome(homeId),
      opts,
    )
  }

  deleteBill(id: number, opts: CallOptions = {}): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "deleteBill",
        resolve: () => this.findBill(id),
        invalidate: (bill) => this.keysFor(bill),
        write: (bill) => this.deps.repository.delete(bill.id),
        event: (_, bill) =>
          domainEvent(DomainModule.Bill, DomainAction.Deleted, { id: bill.id }),
      },
      opts,
    )
  }

  /** Unpaid to paid is one-way. */
  markBillPaid(id: number, opts: CallOptions = {}): Promise<Bill> {
    return this.deps.coordinator.mutate(
      {
        name: "markBillPaid",
        resolve: async () => {
          const bill = await this.findBill(id)
          if (bill.payed) throw HouseholdError.billAlreadyPaid(id)
          return bill
        },
        invalidate: (bill) => this.keysFor(bill),
        write: (bill) => this.deps.repository.markPaid(bill.id, this.deps.clock.now()),
        event: (paid) => domainEvent(DomainModule.Bill, DomainAction.MarkedPayed, paid),
        repopulate: (paid) => this.billCache.set(HouseholdKeys.bill(paid.id), paid, opts),
      },
      opts,
    )
  }

  private keysFor(bill: Bill): string[] {
    return [HouseholdKeys.bill(bill.id), HouseholdKeys.billsForHome(bill.homeId)]
  }

  private async findBill(id: number): Promise<Bill> {
    const bill = await this.deps.repository.findById(id)
    if (bill === null) throw HouseholdError.billNotFound(id)
    return bill
  }
}
