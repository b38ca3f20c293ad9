import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { addMember, createProject } from "../src/services/projects.service.js";
import { taskHistory } from "../src/services/activity.service.js";
import {
  assignTask,
  attachTags,
  changeStatus,
  completeTask,
  createTask,
  deleteTask,
  detachTag,
  getTask,
  listTasks,
  transitionStatus,
  updateTask,
} from "../src/services/tasks.service.js";
import type { TaskRecord } from "../src/db/records.js";
import {
  ADMIN_ID,
  FOREIGN_TAG_ID,
  GLOBAL_TAG_ID,
  INACTIVE_ID,
  MEMBER_ID,
  MISSING_ID,
  OTHER_PROJECT_ID,
  OUTSIDER_ID,
  OWNER_ID,
  PROJECT_ID,
  PROJECT_TAG_ID,
  VIEWER_ID,
  createTestContext,
  seedUser,
  seedWorkspace,
  type TestContext,
} from "./support/fixtures.js";

const T0 = "2026-03-01T12:00:00.000Z";
const T1 = "2026-03-01T12:05:00.000Z";
const T2 = "2026-03-01T12:10:00.000Z";

function freezeClock(iso: string): void {
  vi.setSystemTime(new Date(iso));
}

describe("transitionStatus", () => {
  const base: TaskRecord = {
    id: "t1",
    projectId: "p1",
    title: "Write docs",
    description: null,
    creatorId: "u1",
    assigneeId: null,
    status: "todo",
    priority: "medium",
    dueDate: null,
    estimatedHours: null,
    actualHours: null,
    completedAt: null,
    tagIds: [],
    createdAt: T0,
    updatedAt: T0,
  };

  it("stamps completedAt when entering done", () => {
    expect(transitionStatus(base, "done", T1).completedAt).toBe(T1);
  });

  it("clears completedAt when leaving done", () => {
    const done = { ...base, status: "done" as const, completedAt: T1 };
    const reopened = transitionStatus(done, "in_progress", T2);
    expect(reopened.status).toBe("in_progress");
    expect(reopened.completedAt).toBeNull();
  });

  it("leaves completedAt alone between other statuses", () => {
    const moved = transitionStatus(base, "review", T1);
    expect(moved.status).toBe("review");
    expect(moved.completedAt).toBeNull();
  });

  it("returns the same task when the status does not change", () => {
    expect(transitionStatus(base, "todo", T1)).toBe(base);
  });

  it("allows any status to follow any other", () => {
    const done = transitionStatus(base, "done", T1);
    expect(transitionStatus(done, "todo", T2).status).toBe("todo");
  });
});

describe("task lifecycle", () => {
  let ctx: TestContext;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    freezeClock(T0);
    ctx = createTestContext();
    seedWorkspace(ctx.store);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  async function newTask(overrides: Partial<Parameters<typeof createTask>[2]> = {}) {
    const task = await createTask(ctx, MEMBER_ID, {
      projectId: PROJECT_ID,
      title: "Ship it",
      ...overrides,
    });
    ctx.broadcaster.clear();
    return task;
  }

  describe("end-to-end flow", () => {
    it("creates, completes and records a task for a freshly added member", async () => {
      const u1 = "30000000-0000-4000-8000-000000000001";
      const u2 = "30000000-0000-4000-8000-000000000002";
      seedUser(ctx.store, u1, "ursula");
      seedUser(ctx.store, u2, "ulrich");

      const project = await createProject(ctx, u1, { name: "P" });
      await addMember(ctx, u1, project.id, u2, "member");
      ctx.broadcaster.clear();

      const task = await createTask(ctx, u2, { projectId: project.id, title: "T" });
      expect(task.status).toBe("todo");
      expect(task.completedAt).toBeNull();

      const created = await taskHistory(ctx, u2, task.id);
      expect(created.map((entry) => entry.action)).toEqual(["created"]);

      ctx.broadcaster.clear();
      freezeClock(T1);
      const done = await changeStatus(ctx, u2, task.id, "done");
      expect(done.completedAt).toBe(T1);

      const history = await taskHistory(ctx, u2, task.id);
      const statusRows = history.filter((entry) => entry.action === "status_changed");
      expect(statusRows).toHaveLength(1);
      expect(statusRows[0]?.details).toEqual({ oldStatus: "todo", newStatus: "done" });

      expect(ctx.broadcaster.types()).toEqual(["project:task_status_changed"]);
      expect(ctx.broadcaster.events[0]?.targetId).toBe(project.id);
    });

    it("rejects a non-member without writing a log row or broadcasting", async () => {
      await expect(
        createTask(ctx, OUTSIDER_ID, { projectId: PROJECT_ID, title: "Sneaky" }),
      ).rejects.toMatchObject({ kind: "AccessDenied" });

      expect(ctx.store.tables.activity).toHaveLength(0);
      expect(ctx.store.tables.tasks.size).toBe(0);
      expect(ctx.broadcaster.events).toEqual([]);
    });
  });

  describe("createTask", () => {
    it("fills defaults and records the creator", async () => {
      const task = await createTask(ctx, MEMBER_ID, { projectId: PROJECT_ID, title: "Ship it" });

      expect(task).toMatchObject({
        projectId: PROJECT_ID,
        title: "Ship it",
        description: null,
        creatorId: MEMBER_ID,
        assigneeId: null,
        status: "todo",
        priority: "medium",
        actualHours: null,
        completedAt: null,
        tagIds: [],
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it("stamps completedAt for a task created as done", async () => {
      const task = await createTask(ctx, MEMBER_ID, {
        projectId: PROJECT_ID,
        title: "Already shipped",
        status: "done",
      });
      expect(task.completedAt).toBe(T0);
    });

    it("logs a created entry with the title", async () => {
      const task = await createTask(ctx, MEMBER_ID, { projectId: PROJECT_ID, title: "Ship it" });

      expect(ctx.store.tables.activity).toHaveLength(1);
      expect(ctx.store.tables.activity[0]).toMatchObject({
        userId: MEMBER_ID,
        projectId: PROJECT_ID,
        taskId: task.id,
        action: "created",
        details: { title: "Ship it" },
        createdAt: T0,
      });
    });

    it("notifies the project and, personally, the assignee", async () => {
      const task = await createTask(ctx, MEMBER_ID, {
        projectId: PROJECT_ID,
        title: "Ship it",
        assigneeId: ADMIN_ID,
      });

      expect(ctx.broadcaster.types()).toEqual([
        "project:task_created",
        "user:task_assigned_to_you",
      ]);
      expect(ctx.broadcaster.events[1]).toMatchObject({
        targetId: ADMIN_ID,
        payload: { actorId: MEMBER_ID, projectId: PROJECT_ID, taskId: task.id },
      });
    });

    it("lets viewers read but not create", async () => {
      await expect(
        createTask(ctx, VIEWER_ID, { projectId: PROJECT_ID, title: "Nope" }),
      ).rejects.toMatchObject({ kind: "AccessDenied", message: "member role required" });
    });

    it("accepts the owner as assignee", async () => {
      const task = await createTask(ctx, MEMBER_ID, {
        projectId: PROJECT_ID,
        title: "For the boss",
        assigneeId: OWNER_ID,
      });
      expect(task.assigneeId).toBe(OWNER_ID);
    });

    it("rejects an assignee outside the project", async () => {
      await expect(
        createTask(ctx, MEMBER_ID, {
          projectId: PROJECT_ID,
          title: "Outsourced",
          assigneeId: OUTSIDER_ID,
        }),
      ).rejects.toMatchObject({ kind: "InvalidState", code: "InvalidAssignee" });
    });

    it("rejects unknown and deactivated assignees", async () => {
      for (const assigneeId of [MISSING_ID, INACTIVE_ID]) {
        await expect(
          createTask(ctx, MEMBER_ID, { projectId: PROJECT_ID, title: "Ghost", assigneeId }),
        ).rejects.toMatchObject({ kind: "NotFound", code: "UserNotFound" });
      }
    });

    it("attaches global and project tags", async () => {
      const task = await createTask(ctx, MEMBER_ID, {
        projectId: PROJECT_ID,
        title: "Tagged",
        tagIds: [PROJECT_TAG_ID, GLOBAL_TAG_ID, PROJECT_TAG_ID],
      });
      expect(task.tagIds).toEqual([PROJECT_TAG_ID, GLOBAL_TAG_ID]);
    });

    it("refuses a tag from another project and writes nothing", async () => {
      await expect(
        createTask(ctx, MEMBER_ID, {
          projectId: PROJECT_ID,
          title: "Mixed",
          tagIds: [GLOBAL_TAG_ID, FOREIGN_TAG_ID],
        }),
      ).rejects.toMatchObject({
        code: "TagScopeMismatch",
        message: "Tag 'design' belongs to a different project",
      });
      expect(ctx.store.tables.tasks.size).toBe(0);
    });
  });

  describe("reads", () => {
    it("lets viewers fetch a task", async () => {
      const task = await newTask();
      await expect(getTask(ctx, VIEWER_ID, task.id)).resolves.toMatchObject({ id: task.id });
    });

    it("hides tasks from outsiders", async () => {
      const task = await newTask();
      await expect(getTask(ctx, OUTSIDER_ID, task.id)).rejects.toMatchObject({
        kind: "AccessDenied",
      });
    });

    it("reports missing tasks", async () => {
      await expect(getTask(ctx, MEMBER_ID, MISSING_ID)).rejects.toMatchObject({
        kind: "NotFound",
        code: "TaskNotFound",
      });
    });

    it("filters project tasks", async () => {
      await newTask({ title: "Fix login", priority: "high" });
      freezeClock(T1);
      await newTask({ title: "Write docs", priority: "low" });

      const high = await listTasks(ctx, VIEWER_ID, { projectId: PROJECT_ID, priority: "high" });
      expect(high.map((task) => task.title)).toEqual(["Fix login"]);

      const search = await listTasks(ctx, VIEWER_ID, { projectId: PROJECT_ID, search: "DOCS" });
      expect(search.map((task) => task.title)).toEqual(["Write docs"]);
    });

    it("lists every accessible project's tasks, newest update first", async () => {
      await newTask({ title: "First" });
      freezeClock(T1);
      await createTask(ctx, OUTSIDER_ID, { projectId: OTHER_PROJECT_ID, title: "Theirs" });
      freezeClock(T2);
      await newTask({ title: "Second" });

      const mine = await listTasks(ctx, MEMBER_ID);
      expect(mine.map((task) => task.title)).toEqual(["Second", "First"]);

      const theirs = await listTasks(ctx, OUTSIDER_ID);
      expect(theirs.map((task) => task.title)).toEqual(["Theirs"]);
    });
  });

  describe("updateTask", () => {
    it("records a change set and broadcasts it", async () => {
      const task = await newTask();
      freezeClock(T1);

      const updated = await updateTask(ctx, MEMBER_ID, task.id, {
        title: "Ship it today",
        priority: "urgent",
        description: "Before lunch",
      });

      expect(updated).toMatchObject({
        title: "Ship it today",
        priority: "urgent",
        description: "Before lunch",
        updatedAt: T1,
      });

      const changes = {
        title: { old: "Ship it", new: "Ship it today" },
        description: { old: null, new: "Before lunch" },
        priority: { old: "medium", new: "urgent" },
      };
      const [latest] = await taskHistory(ctx, MEMBER_ID, task.id);
      expect(latest).toMatchObject({ action: "updated", details: { changes } });
      expect(ctx.broadcaster.events).toEqual([
        {
          scope: "project",
          targetId: PROJECT_ID,
          type: "task_updated",
          payload: { actorId: MEMBER_ID, taskId: task.id, changes },
        },
      ]);
    });

    it("is a no-op when nothing differs", async () => {
      const task = await newTask();
      const logRows = ctx.store.tables.activity.length;

      const same = await updateTask(ctx, MEMBER_ID, task.id, { title: "Ship it", priority: "medium" });

      expect(same).toEqual(task);
      expect(ctx.store.tables.activity).toHaveLength(logRows);
      expect(ctx.broadcaster.events).toEqual([]);
    });

    it("follows a status change with its own log row and event", async () => {
      const task = await newTask();
      freezeClock(T1);

      const updated = await updateTask(ctx, MEMBER_ID, task.id, { status: "done" });

      expect(updated.completedAt).toBe(T1);
      const history = await taskHistory(ctx, MEMBER_ID, task.id);
      expect(history.map((entry) => entry.action)).toEqual(["status_changed", "updated", "created"]);
      expect(ctx.broadcaster.types()).toEqual([
        "project:task_updated",
        "project:task_status_changed",
      ]);
    });

    it("reassigns through the same checks as assignTask", async () => {
      const task = await newTask();

      await expect(
        updateTask(ctx, MEMBER_ID, task.id, { assigneeId: OUTSIDER_ID }),
      ).rejects.toMatchObject({ code: "InvalidAssignee" });

      const updated = await updateTask(ctx, MEMBER_ID, task.id, { assigneeId: VIEWER_ID });
      expect(updated.assigneeId).toBe(VIEWER_ID);
      expect(ctx.broadcaster.types()).toEqual([
        "project:task_updated",
        "project:task_assigned",
        "user:task_assigned_to_you",
      ]);
    });

    it("replaces the tag set", async () => {
      const task = await newTask({ tagIds: [GLOBAL_TAG_ID] });

      const updated = await updateTask(ctx, MEMBER_ID, task.id, { tagIds: [PROJECT_TAG_ID] });

      expect(updated.tagIds).toEqual([PROJECT_TAG_ID]);
      const stored = await getTask(ctx, MEMBER_ID, task.id);
      expect(stored.tagIds).toEqual([PROJECT_TAG_ID]);
    });

    it("leaves everything untouched when a tag is out of scope", async () => {
      const task = await newTask({ tagIds: [GLOBAL_TAG_ID] });

      await expect(
        updateTask(ctx, MEMBER_ID, task.id, { title: "Renamed", tagIds: [FOREIGN_TAG_ID] }),
      ).rejects.toMatchObject({ code: "TagScopeMismatch" });

      const stored = await getTask(ctx, MEMBER_ID, task.id);
      expect(stored.title).toBe("Ship it");
      expect(stored.tagIds).toEqual([GLOBAL_TAG_ID]);
    });
  });

  describe("changeStatus and completeTask", () => {
    it("clears completedAt when a done task is reopened", async () => {
      const task = await newTask();
      freezeClock(T1);
      await changeStatus(ctx, MEMBER_ID, task.id, "done");
      freezeClock(T2);

      const reopened = await changeStatus(ctx, MEMBER_ID, task.id, "in_progress");

      expect(reopened.completedAt).toBeNull();
      expect(reopened.updatedAt).toBe(T2);
    });

    it("treats setting the current status as a no-op", async () => {
      const task = await newTask();

      await changeStatus(ctx, MEMBER_ID, task.id, "todo");

      expect(ctx.store.tables.activity).toHaveLength(1);
      expect(ctx.broadcaster.events).toEqual([]);
    });

    it("completes a task with a completed row and a status row", async () => {
      const task = await newTask();
      freezeClock(T1);

      const done = await completeTask(ctx, MEMBER_ID, task.id);

      expect(done).toMatchObject({ status: "done", completedAt: T1, updatedAt: T1 });
      const history = await taskHistory(ctx, MEMBER_ID, task.id);
      expect(history.map((entry) => entry.action)).toEqual([
        "status_changed",
        "completed",
        "created",
      ]);
      expect(history[1]?.details).toEqual({ title: "Ship it" });
      expect(ctx.broadcaster.types()).toEqual(["project:task_status_changed"]);
    });

    it("does nothing when completing a task that is already done", async () => {
      const task = await newTask({ status: "done" });

      const again = await completeTask(ctx, MEMBER_ID, task.id);

      expect(again.completedAt).toBe(T0);
      expect(ctx.store.tables.activity).toHaveLength(1);
      expect(ctx.broadcaster.events).toEqual([]);
    });

    it("forbids viewers from changing status", async () => {
      const task = await newTask();
      await expect(changeStatus(ctx, VIEWER_ID, task.id, "review")).rejects.toMatchObject({
        kind: "AccessDenied",
      });
    });
  });

  describe("assignTask", () => {
    it("assigns, then clears, the assignee", async () => {
      const task = await newTask();

      await assignTask(ctx, MEMBER_ID, task.id, ADMIN_ID);
      expect((await getTask(ctx, MEMBER_ID, task.id)).assigneeId).toBe(ADMIN_ID);

      await assignTask(ctx, MEMBER_ID, task.id, null);
      expect((await getTask(ctx, MEMBER_ID, task.id)).assigneeId).toBeNull();
    });

    it("logs both the new and the previous assignee", async () => {
      const task = await newTask({ assigneeId: VIEWER_ID });

      await assignTask(ctx, MEMBER_ID, task.id, ADMIN_ID);

      const [latest] = await taskHistory(ctx, MEMBER_ID, task.id);
      expect(latest).toMatchObject({
        action: "assigned",
        details: { assigneeId: ADMIN_ID, previousAssigneeId: VIEWER_ID },
      });
    });

    it("sends a personal event to the new assignee only", async () => {
      const task = await newTask();

      await assignTask(ctx, MEMBER_ID, task.id, ADMIN_ID);
      expect(ctx.broadcaster.types()).toEqual(["project:task_assigned", "user:task_assigned_to_you"]);

      ctx.broadcaster.clear();
      await assignTask(ctx, MEMBER_ID, task.id, null);
      expect(ctx.broadcaster.types()).toEqual(["project:task_assigned"]);
    });

    it("leaves the assignee unchanged when the target is not a member", async () => {
      const task = await newTask({ assigneeId: VIEWER_ID });

      await expect(assignTask(ctx, MEMBER_ID, task.id, OUTSIDER_ID)).rejects.toMatchObject({
        kind: "InvalidState",
        code: "InvalidAssignee",
      });

      expect((await getTask(ctx, MEMBER_ID, task.id)).assigneeId).toBe(VIEWER_ID);
      expect(ctx.broadcaster.events).toEqual([]);
    });
  });

  describe("deleteTask", () => {
    it("removes the task and keeps a project-level log row", async () => {
      const task = await newTask({ tagIds: [GLOBAL_TAG_ID] });

      await deleteTask(ctx, MEMBER_ID, task.id);

      expect(ctx.store.tables.tasks.has(task.id)).toBe(false);
      expect(ctx.store.tables.taskTags.has(task.id)).toBe(false);
      expect(ctx.store.tables.activity.at(-1)).toMatchObject({
        projectId: PROJECT_ID,
        taskId: null,
        action: "deleted",
        details: { taskId: task.id, title: "Ship it" },
      });
      expect(ctx.broadcaster.events).toEqual([
        {
          scope: "project",
          targetId: PROJECT_ID,
          type: "task_deleted",
          payload: { actorId: MEMBER_ID, taskId: task.id },
        },
      ]);
    });
  });

  describe("tags on tasks", () => {
    it("adds only tags that are not yet attached", async () => {
      const task = await newTask({ tagIds: [GLOBAL_TAG_ID] });

      const updated = await attachTags(ctx, MEMBER_ID, task.id, [GLOBAL_TAG_ID, PROJECT_TAG_ID]);

      expect(updated.tagIds).toEqual([GLOBAL_TAG_ID, PROJECT_TAG_ID]);
      const [latest] = await taskHistory(ctx, MEMBER_ID, task.id);
      expect(latest?.details).toEqual({
        changes: { tagIds: { old: [GLOBAL_TAG_ID], new: [GLOBAL_TAG_ID, PROJECT_TAG_ID] } },
      });
    });

    it("succeeds without writing when every tag is already attached", async () => {
      const task = await newTask({ tagIds: [GLOBAL_TAG_ID] });

      const same = await attachTags(ctx, MEMBER_ID, task.id, [GLOBAL_TAG_ID]);

      expect(same.tagIds).toEqual([GLOBAL_TAG_ID]);
      expect(ctx.store.tables.activity).toHaveLength(1);
      expect(ctx.broadcaster.events).toEqual([]);
    });

    it("rejects the whole batch when one tag is out of scope", async () => {
      const task = await newTask();

      await expect(
        attachTags(ctx, MEMBER_ID, task.id, [GLOBAL_TAG_ID, FOREIGN_TAG_ID]),
      ).rejects.toMatchObject({ code: "TagScopeMismatch" });

      expect((await getTask(ctx, MEMBER_ID, task.id)).tagIds).toEqual([]);
    });

    it("rejects the whole batch when one tag does not exist", async () => {
      const task = await newTask();

      await expect(
        attachTags(ctx, MEMBER_ID, task.id, [GLOBAL_TAG_ID, MISSING_ID]),
      ).rejects.toMatchObject({ kind: "NotFound", code: "TagNotFound" });

      expect((await getTask(ctx, MEMBER_ID, task.id)).tagIds).toEqual([]);
    });

    it("detaches an attached tag", async () => {
      const task = await newTask({ tagIds: [GLOBAL_TAG_ID, PROJECT_TAG_ID] });

      const updated = await detachTag(ctx, MEMBER_ID, task.id, GLOBAL_TAG_ID);

      expect(updated.tagIds).toEqual([PROJECT_TAG_ID]);
      expect(ctx.broadcaster.types()).toEqual(["project:task_updated"]);
    });

    it("distinguishes a missing tag from one that is not attached", async () => {
      const task = await newTask();

      await expect(detachTag(ctx, MEMBER_ID, task.id, MISSING_ID)).rejects.toMatchObject({
        code: "TagNotFound",
      });
      await expect(detachTag(ctx, MEMBER_ID, task.id, GLOBAL_TAG_ID)).rejects.toMatchObject({
        code: "TagNotAttached",
      });
    });
  });
});
