import type { SafeDataCache } from "@hearth/cache"
import type { TimeSource } from "@hearth/clock"
import { DomainAction, DomainModule, domainEvent } from "@hearth/events"
import { HouseholdKeys } from "../../../keyspace"
import type { CallOptions, DomainServiceDeps } from "../../../lib/service-deps"
import { HouseholdError } from "../../household.errors"
import type {
  AssignmentStatus,
  NewAssignment,
  NewTask,
  Task,
  TaskAssignment,
} from "../model/task.model"
import type { TaskRepository } from "../model/task.repository"

export type TaskServiceDeps = DomainServiceDeps<TaskRepository> & {
  clock: TimeSource
}

export class TaskService {
  private readonly taskCache: SafeDataCache<Task>
  private readonly taskListCache: SafeDataCache<Task[]>
  private readonly assignmentCache: SafeDataCache<TaskAssignment>
  private readonly assignmentListCache: SafeDataCache<TaskAssignment[]>
  private readonly closestCache: SafeDataCache<TaskAssignment | null>

  constructor(private readonly deps: TaskServiceDeps) {
    this.taskCache = deps.cache<Task>()
    this.taskListCache = deps.cache<Task[]>()
    this.assignmentCache = deps.cache<TaskAssignment>()
    this.assignmentListCache = deps.cache<TaskAssignment[]>()
    this.closestCache = deps.cache<TaskAssignment | null>()
  }

  createTask(input: NewTask, opts: CallOptions = {}): Promise<Task> {
    return this.deps.coordinator.mutate(
      {
        name: "createTask",
        invalidate: () => [HouseholdKeys.tasksForHome(input.homeId)],
        write: () => this.deps.repository.create(input),
        event: (task) => domainEvent(DomainModule.Task, DomainAction.Created, task),
      },
      opts,
    )
  }

  getTask(id: number, opts: CallOptions = {}): Promise<Task> {
    return this.deps.coordinator.read(
      this.taskCache,
      HouseholdKeys.task(id),
      () => this.findTask(id),
      opts,
    )
  }

  getTasksForHome(homeId: number, opts: CallOptions = {}): Promise<Task[]> {
    return this.deps.coordinator.read(
      this.taskListCache,
      HouseholdKeys.tasksForHome(homeId),
      () => this.deps.repository.listForHome(homeId),
      opts,
    )
  }

  /** Drops the task and every assignment that goes with it. */
  deleteTask(id: number, opts: CallOptions = {}): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "deleteTask",
        resolve: async () => {
          const task = await this.findTask(id)
          const assignments = await this.deps.repository.listAssignmentsForTask(task.id)
          return { task, assignments }
        },
        invalidate: ({ task, assignments }) => [
          HouseholdKeys.task(task.id),
          HouseholdKeys.tasksForHome(task.homeId),
          ...assignments.flatMap((a) => [
            HouseholdKeys.assignment(a.id),
            ...this.userAssignmentKeys(a.userId),
          ]),
        ],
        write: ({ task }) => this.deps.repository.delete(task.id),
        event: (_, { task }) =>
          domainEvent(DomainModule.Task, DomainAction.Deleted, { id: task.id }),
      },
      opts,
    )
  }

  assignUser(input: NewAssignment, opts: CallOptions = {}): Promise<TaskAssignment> {
    return this.deps.coordinator.mutate(
      {
        name: "assignUser",
        invalidate: () => [
          HouseholdKeys.task(input.taskId),
          HouseholdKeys.tasksForHome(input.homeId),
          ...this.userAssignmentKeys(input.userId),
        ],
        write: () => this.deps.repository.assign(input),
        event: (assignment) =>
          domainEvent(DomainModule.Task, DomainAction.Assigned, assignment),
      },
      opts,
    )
  }

  getAssignmentsForUser(
    userId: number,
    opts: CallOptions = {},
  ): Promise<TaskAssignment[]> {
    return this.deps.coordinator.read(
      this.assignmentListCache,
      HouseholdKeys.assignmentsForUser(userId),
      () => this.deps.repository.listAssignmentsForUser(userId),
      opts,
    )
  }

  getAssignment(id: number, opts: CallOptions = {}): Promise<TaskAssignment> {
    return this.deps.coordinator.read(
      this.assignmentCache,
      HouseholdKeys.assignment(id),
      () => this.findAssignment(id),
      opts,
    )
  }

  /** `null` when the user has nothing open. Absence is not cached. */
  getClosestAssignmentForUser(
    userId: number,
    opts: CallOptions = {},
  ): Promise<TaskAssignment | null> {
    return this.deps.coordinator.read(
      this.closestCache,
      HouseholdKeys.closestAssignmentForUser(userId),
      () => this.deps.repository.findClosestAssignmentForUser(userId),
      { ...opts, shouldCache: (assignment) => assignment !== null },
    )
  }

  markAssignmentCompleted(id: number, opts: CallOptions = {}): Promise<TaskAssignment> {
    return this.setAssignmentStatus(id, "completed", DomainAction.Completed, opts)
  }

  markAssignmentUncompleted(id: number, opts: CallOptions = {}): Promise<TaskAssignment> {
    return this.setAssignmentStatus(id, "assigned", DomainAction.Uncompleted, opts)
  }

  deleteAssignment(id: number, opts: CallOptions = {}): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "deleteAssignment",
        resolve: () => this.findAssignment(id),
        invalidate: (assignment) => [
          HouseholdKeys.assignment(assignment.id),
          ...this.userAssignmentKeys(assignment.userId),
        ],
        write: (assignment) => this.deps.repository.deleteAssignment(assignment.id),
        event: (_, assignment) =>
          domainEvent(DomainModule.Task, DomainAction.Deleted, {
            assignmentId: assignment.id,
            taskId: assignment.taskId,
          }),
      },
      opts,
    )
  }

  private setAssignmentStatus(
    id: number,
    status: AssignmentStatus,
    action: DomainAction,
    opts: CallOptions,
  ): Promise<TaskAssignment> {
    return this.deps.coordinator.mutate(
      {
        name:
          status === "completed" ? "markAssignmentCompleted" : "markAssignmentUncompleted",
        resolve: () => this.findAssignment(id),
        invalidate: (assignment) => [
          HouseholdKeys.assignment(assignment.id),
          ...this.userAssignmentKeys(assignment.userId),
        ],
        write: (assignment) => this.deps.repository.setAssignmentStatus(
          assignment.id,
          status,
          this.deps.clock.now(),
        ),
        event: (updated) => domainEvent(DomainModule.Task, action, updated),
        repopulate: (updated) =>
          this.assignmentCache.set(HouseholdKeys.assignment(updated.id), updated, opts),
      },
      opts,
    )
  }

  private userAssignmentKeys(userId: number): string[] {
    return [
      HouseholdKeys.assignmentsForUser(userId),
      HouseholdKeys.closestAssignmentForUser(userId),
    ]
  }

  private async findTask(id: number): Promise<Task> {
    const task = await this.deps.repository.findById(id)
    if (task === null) throw HouseholdError.taskNotFound(id)
    return task
  }

  private async findAssignment(id: number): Promise<TaskAssignment> {
    const assignment = await this.deps.repository.findAssignment(id)
    if (assignment === null) throw HouseholdError.assignmentNotFound(id)
    return assignment
  }
}
