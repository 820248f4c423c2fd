import { createTestHarness, type TestHarness } from "../../../../tests/test-harness"
import type { TaskService } from "../task.service"

const vacuum = {
  homeId: 7,
  name: "Vacuum",
  description: "Living room",
  scheduleType: "weekly",
} as const

describe("TaskService", () => {
  let h: TestHarness
  let tasks: TaskService

  beforeEach(async () => {
    h = await createTestHarness()
    tasks = h.ctx.services.tasks
  })

  describe("tasks", () => {
    it("announces created tasks and drops the home's task list", async () => {
      await tasks.getTasksForHome(7)
      expect(h.cachedKeys()).toEqual(["tasks:home:7"])

      const task = await tasks.createTask(vacuum)

      expect(h.cachedKeys()).toEqual([])
      expect(h.published()).toEqual([
        {
          module: "TASK",
          action: "CREATED",
          data: { ...vacuum, id: task.id, createdAt: "2024-05-01T09:00:00.000Z" },
        },
      ])
    })

    it("serves repeated reads from the cache", async () => {
      const { id } = await tasks.createTask(vacuum)
      const findById = vi.spyOn(h.repositories.tasks, "findById")

      const first = await tasks.getTask(id)
      const second = await tasks.getTask(id)

      expect(second).toEqual(first)
      expect(second.createdAt).toBeInstanceOf(Date)
      expect(findById).toHaveBeenCalledOnce()
    })

    it("replaces a cached entry that is not in the cache's own format", async () => {
      const task = await tasks.createTask(vacuum)
      await h.redis.set(
        "hearth:test:cache:task:1",
        Buffer.from(JSON.stringify({ id: 1, name: "Dust" })),
      )

      expect(await tasks.getTask(task.id)).toEqual(task)
      expect(h.logger.at("warn")).toMatchObject([
        { message: "Discarding undecodable cache entry", fields: { key: "task:1" } },
      ])
      expect(await tasks.getTask(task.id)).toEqual(task)
    })

    it("does not load a task for a caller that has already given up", async () => {
      const { id } = await tasks.createTask(vacuum)
      const findById = vi.spyOn(h.repositories.tasks, "findById")
      const controller = new AbortController()
      controller.abort()

      await expect(tasks.getTask(id, { signal: controller.signal })).rejects.toMatchObject({
        code: "operation_aborted",
      })
      expect(findById).not.toHaveBeenCalled()
      expect(h.cachedKeys()).toEqual([])
    })

    it("rejects unknown tasks without caching anything", async () => {
      await expect(tasks.getTask(99)).rejects.toMatchObject({
        code: "task_not_found",
        context: { id: 99 },
      })
      expect(h.cachedKeys()).toEqual([])
    })

    it("deletes a task and the list of the home it belonged to", async () => {
      const { id } = await tasks.createTask(vacuum)
      await tasks.getTask(id)
      await tasks.getTasksForHome(7)

      await tasks.deleteTask(id)

      expect(h.cachedKeys()).toEqual([])
      expect(h.published().at(-1)).toEqual({
        module: "TASK",
        action: "DELETED",
        data: { id },
      })
      expect(await tasks.getTasksForHome(7)).toEqual([])
    })

    it("drops the cached assignments of a deleted task", async () => {
      const task = await tasks.createTask(vacuum)
      const assignment = await tasks.assignUser({
        taskId: task.id,
        userId: 2,
        homeId: 7,
        date: new Date("2024-05-06T08:00:00.000Z"),
      })
      await tasks.getTask(task.id)
      await tasks.getAssignment(assignment.id)
      await tasks.getAssignmentsForUser(2)
      await tasks.getClosestAssignmentForUser(2)
      expect(h.cachedKeys()).toEqual([
        "assignment:1",
        "assignment:closest:2",
        "assignments:user:2",
        "task:1",
      ])

      await tasks.deleteTask(task.id)

      expect(h.cachedKeys()).toEqual([])
      expect(await tasks.getClosestAssignmentForUser(2)).toBeNull()
      expect(await tasks.getAssignmentsForUser(2)).toEqual([])
      await expect(tasks.getAssignment(assignment.id)).rejects.toMatchObject({
        code: "assignment_not_found",
      })
    })

    it("refuses to delete a task that does not exist", async () => {
      await expect(tasks.deleteTask(99)).rejects.toMatchObject({ code: "task_not_found" })
      expect(h.published()).toEqual([])
    })
  })

  describe("assignments", () => {
    const monday = new Date("2024-05-06T08:00:00.000Z")

    it("drops the task and both of the user's assignment entries when assigning", async () => {
      const task = await tasks.createTask(vacuum)
      await tasks.getTask(task.id)
      await tasks.getTasksForHome(7)
      await tasks.getAssignmentsForUser(2)

      const assignment = await tasks.assignUser({
        taskId: task.id,
        userId: 2,
        homeId: 7,
        date: monday,
      })

      expect(h.cachedKeys()).toEqual([])
      expect(h.published().at(-1)).toEqual({
        module: "TASK",
        action: "ASSIGNED",
        data: {
          id: assignment.id,
          taskId: task.id,
          homeId: 7,
          userId: 2,
          status: "assigned",
          assignedDate: "2024-05-06T08:00:00.000Z",
        },
      })
    })

    it("does not cache the absence of a closest assignment", async () => {
      expect(await tasks.getClosestAssignmentForUser(2)).toBeNull()
      expect(h.cachedKeys()).toEqual([])

      const task = await tasks.createTask(vacuum)
      await tasks.assignUser({ taskId: task.id, userId: 2, homeId: 7, date: monday })

      expect(await tasks.getClosestAssignmentForUser(2)).toMatchObject({
        taskId: task.id,
        userId: 2,
      })
      expect(h.cachedKeys()).toEqual(["assignment:closest:2"])
    })

    it("marks an assignment completed and caches the fresh copy", async () => {
      const task = await tasks.createTask(vacuum)
      const assignment = await tasks.assignUser({
        taskId: task.id,
        userId: 2,
        homeId: 7,
        date: monday,
      })
      await tasks.getAssignmentsForUser(2)
      await tasks.getClosestAssignmentForUser(2)

      const completed = await tasks.markAssignmentCompleted(assignment.id)

      expect(completed).toMatchObject({
        status: "completed",
        completedAt: new Date("2024-05-01T09:00:00.000Z"),
      })
      expect(h.cachedKeys()).toEqual([`assignment:${assignment.id}`])
      expect(h.published().at(-1)).toMatchObject({
        module: "TASK",
        action: "COMPLETED",
        data: { status: "completed" },
      })
      expect(await tasks.getClosestAssignmentForUser(2)).toBeNull()
    })

    it("reopens a completed assignment", async () => {
      const task = await tasks.createTask(vacuum)
      const assignment = await tasks.assignUser({
        taskId: task.id,
        userId: 2,
        homeId: 7,
        date: monday,
      })
      await tasks.markAssignmentCompleted(assignment.id)

      const reopened = await tasks.markAssignmentUncompleted(assignment.id)

      expect(reopened.status).toBe("assigned")
      expect(reopened).not.toHaveProperty("completedAt")
      expect(h.published().at(-1)).toMatchObject({ action: "UNCOMPLETED" })
    })

    it("announces deleted assignments with both ids", async () => {
      const task = await tasks.createTask(vacuum)
      const assignment = await tasks.assignUser({
        taskId: task.id,
        userId: 2,
        homeId: 7,
        date: monday,
      })

      await tasks.deleteAssignment(assignment.id)

      expect(h.published().at(-1)).toEqual({
        module: "TASK",
        action: "DELETED",
        data: { assignmentId: assignment.id, taskId: task.id },
      })
      expect(await tasks.getAssignmentsForUser(2)).toEqual([])
    })

    it("reads a single assignment through the cache", async () => {
      const task = await tasks.createTask(vacuum)
      const assignment = await tasks.assignUser({
        taskId: task.id,
        userId: 2,
        homeId: 7,
        date: monday,
      })
      const findAssignment = vi.spyOn(h.repositories.tasks, "findAssignment")

      expect(await tasks.getAssignment(assignment.id)).toEqual(assignment)
      expect(await tasks.getAssignment(assignment.id)).toEqual(assignment)

      expect(findAssignment).toHaveBeenCalledOnce()
      expect(h.cachedKeys()).toEqual([`assignment:${assignment.id}`])
    })

    it("serves the copy cached by a status change", async () => {
      const task = await tasks.createTask(vacuum)
      const assignment = await tasks.assignUser({
        taskId: task.id,
        userId: 2,
        homeId: 7,
        date: monday,
      })
      await tasks.markAssignmentCompleted(assignment.id)
      const findAssignment = vi.spyOn(h.repositories.tasks, "findAssignment")

      expect(await tasks.getAssignment(assignment.id)).toMatchObject({
        status: "completed",
      })
      expect(findAssignment).not.toHaveBeenCalled()
    })

    it("rejects status changes on unknown assignments", async () => {
      await expect(tasks.markAssignmentCompleted(5)).rejects.toMatchObject({
        code: "assignment_not_found",
      })
      await expect(tasks.deleteAssignment(5)).rejects.toMatchObject({
        code: "assignment_not_found",
      })
      await expect(tasks.getAssignment(5)).rejects.toMatchObject({
        code: "assignment_not_found",
      })
    })
  })
})
