import type { TimeSource } from "@hearth/clock"
import type {
  AssignmentStatus,
  NewAssignment,
  NewTask,
  Task,
  TaskAssignment,
} from "../../domains/tasks/model/task.model"
import type { TaskRepository } from "../../domains/tasks/model/task.repository"
import { copy, Sequence } from "./sequence"

export class InMemoryTaskRepository implements TaskRepository {
  readonly tasks = new Map<number, Task>()
  readonly assignments = new Map<number, TaskAssignment>()
  private readonly taskIds = new Sequence()
  private readonly assignmentIds = new Sequence()

  constructor(private readonly clock: TimeSource) {}

  async create(input: NewTask): Promise<Task> {
    const task: Task = { id: this.taskIds.next(), createdAt: this.clock.now(), ...input }
    this.tasks.set(task.id, task)
    return copy(task)
  }

  async findById(id: number): Promise<Task | null> {
    const task = this.tasks.get(id)
    return task === undefined ? null : copy(task)
  }

  async listForHome(homeId: number): Promise<Task[]> {
    return [...this.tasks.values()].filter((t) => t.homeId === homeId).map(copy)
  }

  async delete(id: number): Promise<void> {
    this.tasks.delete(id)
    for (const assignment of this.assignments.values()) {
      if (assignment.taskId === id) this.assignments.delete(assignment.id)
    }
  }

  async assign(input: NewAssignment): Promise<TaskAssignment> {
    const assignment: TaskAssignment = {
      id: this.assignmentIds.next(),
      taskId: input.taskId,
      homeId: input.homeId,
      userId: input.userId,
      status: "assigned",
      assignedDate: input.date,
    }
    this.assignments.set(assignment.id, assignment)
    return copy(assignment)
  }

  async findAssignment(id: number): Promise<TaskAssignment | null> {
    const assignment = this.assignments.get(id)
    return assignment === undefined ? null : copy(assignment)
  }

  async listAssignmentsForUser(userId: number): Promise<TaskAssignment[]> {
    return [...this.assignments.values()].filter((a) => a.userId === userId).map(copy)
  }

  async listAssignmentsForTask(taskId: number): Promise<TaskAssignment[]> {
    return [...this.assignments.values()].filter((a) => a.taskId === taskId).map(copy)
  }

  async findClosestAssignmentForUser(userId: number): Promise<TaskAssignment | null> {
    const open = [...this.assignments.values()]
      .filter((a) => a.userId === userId && a.status === "assigned")
      .sort((a, b) => a.assignedDate.getTime() - b.assignedDate.getTime())

    const [closest] = open
    return closest === undefined ? null : copy(closest)
  }

  async setAssignmentStatus(
    id: number,
    status: AssignmentStatus,
    at: Date,
  ): Promise<TaskAssignment> {
    const current = this.assignments.get(id)
    if (current === undefined) throw new Error(`assignment ${id} does not exist`)

    const updated: TaskAssignment = {
      id: current.id,
      taskId: current.taskId,
      homeId: current.homeId,
      userId: current.userId,
      assignedDate: current.assignedDate,
      status,
      ...(status === "completed" && { completedAt: at }),
    }
    this.assignments.set(id, updated)
    return copy(updated)
  }

  async deleteAssignment(id: number): Promise<void> {
    this.assignments.delete(id)
  }
}
