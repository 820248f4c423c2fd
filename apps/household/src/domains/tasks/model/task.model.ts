export type ScheduleType = "once" | "daily" | "weekly" | "monthly"

export type Task = {
  id: number
  homeId: number
  name: string
  description: string
  scheduleType: ScheduleType
  createdAt: Date
}

export type NewTask = Pick<Task, "homeId" | "name" | "description" | "scheduleType">

export type AssignmentStatus = "assigned" | "completed"

export type TaskAssignment = {
  id: number
  taskId: number
  homeId: number
  userId: number
  status: AssignmentStatus
  assignedDate: Date
  completedAt?: Date
}

export type NewAssignment = {
  taskId: number
  userId: number
  homeId: number
  date: Date
}
