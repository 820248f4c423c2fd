export type Room = {
  id: number
  homeId: number
  name: string
  createdAt: Date
}
