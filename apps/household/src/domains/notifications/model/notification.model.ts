export type Notification = {
  id: number
  from?: number
  to: number
  description: string
  read: boolean
  createdAt: Date
}

export type HomeNotification = {
  id: number
  from?: number
  homeId: number
  description: string
  read: boolean
  createdAt: Date
}

export type NewNotification = Pick<Notification, "to" | "description"> & { from?: number }

export type NewHomeNotification = Pick<HomeNotification, "homeId" | "description"> & {
  from?: number
}
