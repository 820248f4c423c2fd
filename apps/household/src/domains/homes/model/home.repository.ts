import type { Home, HomeDependents, MemberRole, NewHome } from "./home.model"

export interface HomeRepository {
  /** Generates the invite code. */
  create(input: NewHome): Promise<Home>
  findById(id: number): Promise<Home | null>
  findByInviteCode(code: string): Promise<Home | null>
  addMember(homeId: number, userId: number, role: MemberRole): Promise<void>
  removeMember(homeId: number, userId: number): Promise<void>
  findDependents(id: number): Promise<HomeDependents>
  /**
   * Cascades to every row the home owns: tasks with their assignments,
   * bills, bill categories, polls, rooms, shopping categories with their
   * items, and home notifications.
   */
  delete(id: number): Promise<void>
}
