import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../src/db/pool.js", () => ({
  pool: {
    query: vi.fn(),
    getConnection: vi.fn(),
  },
}));

import { pool } from "../src/db/pool.js";
import { MysqlStore, translateDriverError } from "../src/db/mysql-store.js";
import { ConflictError, NotFoundError } from "../src/errors.js";

const mockGetConnection = pool.getConnection as ReturnType<typeof vi.fn>;

const mockConnection = {
  query: vi.fn(),
  beginTransaction: vi.fn(),
  commit: vi.fn(),
  rollback: vi.fn(),
  release: vi.fn(),
};

const createdAt = new Date("2026-02-17T10:00:00.000Z");

beforeEach(() => {
  vi.clearAllMocks();
  mockGetConnection.mockResolvedValue(mockConnection);
});

describe("MysqlStore", () => {
  const store = new MysqlStore(pool);

  it("commits and releases the connection", async () => {
    mockConnection.query.mockResolvedValue([{ affectedRows: 1 }]);

    await store.transaction((repos) => repos.deleteTask("t1"));

    expect(mockConnection.beginTransaction).toHaveBeenCalledTimes(1);
    expect(mockConnection.commit).toHaveBeenCalledTimes(1);
    expect(mockConnection.rollback).not.toHaveBeenCalled();
    expect(mockConnection.release).toHaveBeenCalledTimes(1);
  });

  it("deletes a task's tag links and comments before the task", async () => {
    mockConnection.query.mockResolvedValue([{ affectedRows: 1 }]);

    await store.transaction((repos) => repos.deleteTask("t1"));

    expect(mockConnection.query.mock.calls.map((call) => call[0])).toEqual([
      "DELETE FROM task_tags WHERE task_id = ?",
      "DELETE FROM comments WHERE task_id = ?",
      "DELETE FROM tasks WHERE id = ?",
    ]);
  });

  it("rolls back and reports driver conflicts as WriteConflict", async () => {
    mockConnection.query.mockRejectedValueOnce(
      Object.assign(new Error("Duplicate entry"), { code: "ER_DUP_ENTRY" }),
    );

    await expect(
      store.transaction((repos) => repos.deleteComment("c1")),
    ).rejects.toMatchObject({ kind: "Conflict", code: "WriteConflict" });

    expect(mockConnection.commit).not.toHaveBeenCalled();
    expect(mockConnection.rollback).toHaveBeenCalledTimes(1);
    expect(mockConnection.release).toHaveBeenCalledTimes(1);
  });

  it("reports the original failure when the rollback also fails", async () => {
    mockConnection.query.mockRejectedValueOnce(
      Object.assign(new Error("Duplicate entry"), { code: "ER_DUP_ENTRY" }),
    );
    mockConnection.rollback.mockRejectedValueOnce(new Error("connection lost"));

    await expect(
      store.transaction((repos) => repos.deleteComment("c1")),
    ).rejects.toMatchObject({ kind: "Conflict", code: "WriteConflict" });

    expect(mockConnection.rollback).toHaveBeenCalledTimes(1);
    expect(mockConnection.release).toHaveBeenCalledTimes(1);
  });

  it("reads without a transaction", async () => {
    mockConnection.query.mockResolvedValueOnce([[]]);

    await expect(store.run((repos) => repos.findUserById("u1"))).resolves.toBeNull();

    expect(mockConnection.beginTransaction).not.toHaveBeenCalled();
    expect(mockConnection.release).toHaveBeenCalledTimes(1);
  });

  it("maps task rows with their tag ids", async () => {
    mockConnection.query
      .mockResolvedValueOnce([
        [
          {
            id: "t1",
            project_id: "p1",
            title: "Ship",
            description: null,
            creator_id: "u1",
            assignee_id: null,
            status: "done",
            priority: "high",
            due_date: null,
            estimated_hours: 2.5,
            actual_hours: null,
            completed_at: createdAt,
            created_at: createdAt,
            updated_at: createdAt,
          },
        ],
      ])
      .mockResolvedValueOnce([
        [
          { task_id: "t1", tag_id: "g1" },
          { task_id: "t1", tag_id: "g2" },
        ],
      ]);

    const task = await store.run((repos) => repos.findTask("t1", { forUpdate: true }));

    expect(mockConnection.query.mock.calls[0]?.[0]).toBe(
      "SELECT * FROM tasks WHERE id = ? LIMIT 1 FOR UPDATE",
    );
    expect(task).toEqual({
      id: "t1",
      projectId: "p1",
      title: "Ship",
      description: null,
      creatorId: "u1",
      assigneeId: null,
      status: "done",
      priority: "high",
      dueDate: null,
      estimatedHours: 2.5,
      actualHours: null,
      completedAt: "2026-02-17T10:00:00.000Z",
      tagIds: ["g1", "g2"],
      createdAt: "2026-02-17T10:00:00.000Z",
      updatedAt: "2026-02-17T10:00:00.000Z",
    });
  });

  it("skips the query when no project is visible", async () => {
    const tasks = await store.run((repos) => repos.listTasks({ projectIds: [] }));

    expect(tasks).toEqual([]);
    expect(mockConnection.query).not.toHaveBeenCalled();
  });

  it("parses activity details stored as JSON text", async () => {
    mockConnection.query.mockResolvedValueOnce([
      [
        {
          id: "a1",
          user_id: "u1",
          project_id: "p1",
          task_id: null,
          action: "member_added",
          details: '{"memberId":"u2","role":"viewer"}',
          created_at: createdAt,
        },
      ],
    ]);

    const [entry] = await store.run((repos) => repos.listActivityForProject("p1", 10));

    expect(entry?.details).toEqual({ memberId: "u2", role: "viewer" });
  });
});

describe("translateDriverError", () => {
  it("passes application errors and unknown failures through", () => {
    const notFound = new NotFoundError("TaskNotFound", "Task not found");
    const other = new Error("connection lost");

    expect(translateDriverError(notFound)).toBe(notFound);
    expect(translateDriverError(other)).toBe(other);
  });

  it("maps deadlocks and lock timeouts to conflicts", () => {
    expect(translateDriverError({ code: "ER_LOCK_DEADLOCK" })).toBeInstanceOf(ConflictError);
    expect(translateDriverError({ code: "ER_LOCK_WAIT_TIMEOUT" })).toBeInstanceOf(ConflictError);
  });
});
