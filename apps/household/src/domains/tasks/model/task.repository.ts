import type {
  AssignmentStatus,
  NewAssignment,
  NewTask,
  Task,
  TaskAssignment,
} from "./task.model"

export interface TaskRepository {
  create(input: NewTask): Promise<Task>
  findById(id: number): Promise<Task | null>
  listForHome(homeId: number): Promise<Task[]>
  /** Cascades to the task's assignments. */
  delete(id: number): Promise<void>

  assign(input: NewAssignment): Promise<TaskAssignment>
  findAssignment(id: number): Promise<TaskAssignment | null>
  listAssignmentsForUser(userId: number): Promise<TaskAssignment[]>
  listAssignmentsForTask(taskId: number): Promise<TaskAssignment[]>
  /** The user's earliest still-open assignment. */
  findClosestAssignmentForUser(userId: number): Promise<TaskAssignment | null>
  /** `completedAt` is set when moving to `completed` and cleared otherwise. */
  setAssignmentStatus(
    id: number,
    status: AssignmentStatus,
    at: Date,
  ): Promise<TaskAssignment>
  deleteAssignment(id: number): Promise<void>
}
