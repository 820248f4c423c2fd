import type { User } from "./user.model"

export interface UserRepository {
  findById(id: number): Promise<User | null>
  /** `null` when no such user exists. */
  updateName(id: number, name: string): Promise<User | null>
  updateAvatar(id: number, path: string): Promise<User | null>
}
