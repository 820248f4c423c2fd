export type User = {
  id: number
  email: string
  name: string
  avatar: string
  createdAt: Date
}
