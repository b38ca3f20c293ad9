import type { Pool, PoolConnection } from "mysql2/promise";
import type { ResultSetHeader, RowDataPacket } from "mysql2";
import { ConflictError, isAppError } from "../errors.js";
import { getLogger } from "../util/logger.js";
import type {
  ActivityAction,
  ActivityDetails,
  ActivityRecord,
  CommentRecord,
  MemberRole,
  ProjectMemberRecord,
  ProjectRecord,
  TagRecord,
  TaskPriority,
  TaskRecord,
  TaskStatus,
  UserRecord,
} from "./records.js";
import type {
  LockOptions,
  Repositories,
  Store,
  TagScopeQuery,
  TaskQuery,
} from "./store.js";

const logger = getLogger("mysql-store");

interface UserRow extends RowDataPacket {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  display_name: string | null;
  avatar_url: string | null;
  is_active: number;
  last_login_at: Date | string | null;
  created_at: Date | string;
  updated_at: Date | string;
}

interface ProjectRow extends RowDataPacket {
  id: string;
  name: string;
  description: string | null;
  owner_id: string;
  color: string | null;
  icon: string | null;
  is_archived: number;
  created_at: Date | string;
  updated_at: Date | string;
}

interface ProjectIdRow extends RowDataPacket {
  id: string;
}

interface MemberRow extends RowDataPacket {
  project_id: string;
  user_id: string;
  role: MemberRole;
  joined_at: Date | string;
}

interface TaskRow extends RowDataPacket {
  id: string;
  project_id: string;
  title: string;
  description: string | null;
  creator_id: string;
  assignee_id: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  due_date: Date | string | null;
  estimated_hours: number | null;
  actual_hours: number | null;
  completed_at: Date | string | null;
  created_at: Date | string;
  updated_at: Date | string;
}

interface TaskTagRow extends RowDataPacket {
  task_id: string;
  tag_id: string;
}

interface TagRow extends RowDataPacket {
  id: string;
  name: string;
  color: string | null;
  project_id: string | null;
  created_at: Date | string;
  updated_at: Date | string;
}

interface CommentRow extends RowDataPacket {
  id: string;
  task_id: string;
  author_id: string;
  content: string;
  is_edited: number;
  created_at: Date | string;
  updated_at: Date | string;
}

interface ActivityRow extends RowDataPacket {
  id: string;
  user_id: string;
  project_id: string;
  task_id: string | null;
  action: ActivityAction;
  details: unknown;
  created_at: Date | string;
}

const CONFLICT_CODES = new Set(["ER_LOCK_DEADLOCK", "ER_LOCK_WAIT_TIMEOUT", "ER_DUP_ENTRY"]);

export class MysqlStore implements Store {
  constructor(private readonly pool: Pool) {}

  async run<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const connection = await this.pool.getConnection();
    try {
      return await work(new MysqlRepositories(connection));
    } finally {
      connection.release();
    }
  }

  async transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const connection = await this.pool.getConnection();

    try {
      await connection.beginTransaction();
      const result = await work(new MysqlRepositories(connection));
      await connection.commit();
      return result;
    } catch (error) {
      try {
        await connection.rollback();
      } catch (rollbackError) {
        logger.error({ err: rollbackError }, "Rollback failed");
      }
      throw translateDriverError(error);
    } finally {
      connection.release();
    }
  }
}

export class MysqlRepositories implements Repositories {
  constructor(private readonly connection: PoolConnection) {}

  // --- Users ---

  async findUserById(id: string): Promise<UserRecord | null> {
    const [rows] = await this.connection.query<UserRow[]>(
      "SELECT * FROM users WHERE id = ? LIMIT 1",
      [id],
    );
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async findUserByUsername(username: string): Promise<UserRecord | null> {
    const [rows] = await this.connection.query<UserRow[]>(
      "SELECT * FROM users WHERE username = ? LIMIT 1",
      [username],
    );
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const [rows] = await this.connection.query<UserRow[]>(
      "SELECT * FROM users WHERE email = ? LIMIT 1",
      [email],
    );
    return rows[0] ? mapUserRow(rows[0]) : null;
  }

  async insertUser(user: UserRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      `INSERT INTO users
         (id, username, email, password_hash, display_name, avatar_url, is_active,
          last_login_at, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        user.id,
        user.username,
        user.email,
        user.passwordHash,
        user.displayName,
        user.avatarUrl,
        user.isActive ? 1 : 0,
        toDbDate(user.lastLoginAt),
        toDbDate(user.createdAt),
        toDbDate(user.updatedAt),
      ],
    );
  }

  async updateUser(user: UserRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      `UPDATE users
       SET email = ?, password_hash = ?, display_name = ?, avatar_url = ?, is_active = ?,
           last_login_at = ?, updated_at = ?
       WHERE id = ?`,
      [
        user.email,
        user.passwordHash,
        user.displayName,
        user.avatarUrl,
        user.isActive ? 1 : 0,
        toDbDate(user.lastLoginAt),
        toDbDate(user.updatedAt),
        user.id,
      ],
    );
  }

  async searchUsers(term: string, limit: number): Promise<UserRecord[]> {
    const pattern = `%${escapeLike(term)}%`;
    const [rows] = await this.connection.query<UserRow[]>(
      `SELECT * FROM users
       WHERE is_active = 1 AND (username LIKE ? OR email LIKE ? OR display_name LIKE ?)
       ORDER BY username ASC
       LIMIT ?`,
      [pattern, pattern, pattern, limit],
    );
    return rows.map(mapUserRow);
  }

  // --- Projects ---

  async findProject(id: string, options: LockOptions = {}): Promise<ProjectRecord | null> {
    const lock = options.forUpdate ? " FOR UPDATE" : "";
    const [rows] = await this.connection.query<ProjectRow[]>(
      `SELECT * FROM projects WHERE id = ? LIMIT 1${lock}`,
      [id],
    );
    return rows[0] ? mapProjectRow(rows[0]) : null;
  }

  async insertProject(project: ProjectRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      `INSERT INTO projects
         (id, name, description, owner_id, color, icon, is_archived, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        project.id,
        project.name,
        project.description,
        project.ownerId,
        project.color,
        project.icon,
        project.isArchived ? 1 : 0,
        toDbDate(project.createdAt),
        toDbDate(project.updatedAt),
      ],
    );
  }

  async updateProject(project: ProjectRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      `UPDATE projects
       SET name = ?, description = ?, color = ?, icon = ?, is_archived = ?, updated_at = ?
       WHERE id = ?`,
      [
        project.name,
        project.description,
        project.color,
        project.icon,
        project.isArchived ? 1 : 0,
        toDbDate(project.updatedAt),
        project.id,
      ],
    );
  }

  async listProjectsForUser(userId: string, archived: boolean): Promise<ProjectRecord[]> {
    const [rows] = await this.connection.query<ProjectRow[]>(
      `
        SELECT p.*
        FROM projects p
        WHERE p.is_archived = ?
          AND (
            p.owner_id = ?
            OR EXISTS (
              SELECT 1 FROM project_members pm
              WHERE pm.project_id = p.id AND pm.user_id = ?
            )
          )
        ORDER BY p.updated_at DESC, p.id DESC
      `,
      [archived ? 1 : 0, userId, userId],
    );
    return rows.map(mapProjectRow);
  }

  async listAccessibleProjectIds(userId: string): Promise<string[]> {
    const [rows] = await this.connection.query<ProjectIdRow[]>(
      `
        SELECT id FROM projects WHERE owner_id = ?
        UNION
        SELECT project_id AS id FROM project_members WHERE user_id = ?
      `,
      [userId, userId],
    );
    return rows.map((row) => row.id);
  }

  // --- Members ---

  async findMember(projectId: string, userId: string): Promise<ProjectMemberRecord | null> {
    const [rows] = await this.connection.query<MemberRow[]>(
      "SELECT * FROM project_members WHERE project_id = ? AND user_id = ? LIMIT 1",
      [projectId, userId],
    );
    return rows[0] ? mapMemberRow(rows[0]) : null;
  }

  async listMembers(projectId: string): Promise<ProjectMemberRecord[]> {
    const [rows] = await this.connection.query<MemberRow[]>(
      "SELECT * FROM project_members WHERE project_id = ? ORDER BY joined_at ASC, user_id ASC",
      [projectId],
    );
    return rows.map(mapMemberRow);
  }

  async insertMember(member: ProjectMemberRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      "INSERT INTO project_members (project_id, user_id, role, joined_at) VALUES (?, ?, ?, ?)",
      [member.projectId, member.userId, member.role, toDbDate(member.joinedAt)],
    );
  }

  async updateMember(member: ProjectMemberRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      "UPDATE project_members SET role = ? WHERE project_id = ? AND user_id = ?",
      [member.role, member.projectId, member.userId],
    );
  }

  async deleteMember(projectId: string, userId: string): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      "DELETE FROM project_members WHERE project_id = ? AND user_id = ?",
      [projectId, userId],
    );
  }

  // --- Tasks ---

  async findTask(id: string, options: LockOptions = {}): Promise<TaskRecord | null> {
    const lock = options.forUpdate ? " FOR UPDATE" : "";
    const [rows] = await this.connection.query<TaskRow[]>(
      `SELECT * FROM tasks WHERE id = ? LIMIT 1${lock}`,
      [id],
    );
    const row = rows[0];
    if (!row) return null;

    const tagIds = await this.loadTagIds([row.id]);
    return mapTaskRow(row, tagIds.get(row.id) ?? []);
  }

  async listTasks(query: TaskQuery): Promise<TaskRecord[]> {
    if (query.projectIds.length === 0) return [];

    const conditions = ["project_id IN (?)"];
    const values: unknown[] = [query.projectIds];

    if (query.status !== undefined) {
      conditions.push("status = ?");
      values.push(query.status);
    }
    if (query.priority !== undefined) {
      conditions.push("priority = ?");
      values.push(query.priority);
    }
    if (query.assigneeId !== undefined) {
      conditions.push("assignee_id = ?");
      values.push(query.assigneeId);
    }
    if (query.search !== undefined) {
      const pattern = `%${escapeLike(query.search)}%`;
      conditions.push("(title LIKE ? OR description LIKE ?)");
      values.push(pattern, pattern);
    }

    const [rows] = await this.connection.query<TaskRow[]>(
      `SELECT * FROM tasks WHERE ${conditions.join(" AND ")} ORDER BY updated_at DESC, id DESC`,
      values,
    );

    const tagIds = await this.loadTagIds(rows.map((row) => row.id));
    return rows.map((row) => mapTaskRow(row, tagIds.get(row.id) ?? []));
  }

  async insertTask(task: TaskRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      `INSERT INTO tasks
         (id, project_id, title, description, creator_id, assignee_id, status, priority,
          due_date, estimated_hours, actual_hours, completed_at, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        task.id,
        task.projectId,
        task.title,
        task.description,
        task.creatorId,
        task.assigneeId,
        task.status,
        task.priority,
        toDbDate(task.dueDate),
        task.estimatedHours,
        task.actualHours,
        toDbDate(task.completedAt),
        toDbDate(task.createdAt),
        toDbDate(task.updatedAt),
      ],
    );

    await this.attachTags(task.id, task.tagIds);
  }

  async updateTask(task: TaskRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      `UPDATE tasks
       SET title = ?, description = ?, assignee_id = ?, status = ?, priority = ?,
           due_date = ?, estimated_hours = ?, actual_hours = ?, completed_at = ?, updated_at = ?
       WHERE id = ?`,
      [
        task.title,
        task.description,
        task.assigneeId,
        task.status,
        task.priority,
        toDbDate(task.dueDate),
        task.estimatedHours,
        task.actualHours,
        toDbDate(task.completedAt),
        toDbDate(task.updatedAt),
        task.id,
      ],
    );
  }

  async deleteTask(id: string): Promise<void> {
    await this.connection.query<ResultSetHeader>("DELETE FROM task_tags WHERE task_id = ?", [id]);
    await this.connection.query<ResultSetHeader>("DELETE FROM comments WHERE task_id = ?", [id]);
    await this.connection.query<ResultSetHeader>("DELETE FROM tasks WHERE id = ?", [id]);
  }

  async attachTags(taskId: string, tagIds: string[]): Promise<void> {
    if (tagIds.length === 0) return;

    await this.connection.query<ResultSetHeader>(
      "INSERT IGNORE INTO task_tags (task_id, tag_id) VALUES ?",
      [tagIds.map((tagId) => [taskId, tagId])],
    );
  }

  async detachTag(taskId: string, tagId: string): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      "DELETE FROM task_tags WHERE task_id = ? AND tag_id = ?",
      [taskId, tagId],
    );
  }

  async replaceTags(taskId: string, tagIds: string[]): Promise<void> {
    await this.connection.query<ResultSetHeader>("DELETE FROM task_tags WHERE task_id = ?", [
      taskId,
    ]);
    await this.attachTags(taskId, tagIds);
  }

  // --- Tags ---

  async findTag(id: string): Promise<TagRecord | null> {
    const [rows] = await this.connection.query<TagRow[]>(
      "SELECT id, name, color, project_id, created_at, updated_at FROM tags WHERE id = ? LIMIT 1",
      [id],
    );
    return rows[0] ? mapTagRow(rows[0]) : null;
  }

  async findTagByName(name: string, projectId: string | null): Promise<TagRecord | null> {
    const [rows] = await this.connection.query<TagRow[]>(
      `SELECT id, name, color, project_id, created_at, updated_at
       FROM tags
       WHERE name = ? AND project_id <=> ?
       LIMIT 1`,
      [name, projectId],
    );
    return rows[0] ? mapTagRow(rows[0]) : null;
  }

  async listTags(query: TagScopeQuery): Promise<TagRecord[]> {
    const scopes: string[] = [];
    const values: unknown[] = [];

    if (query.includeGlobal) {
      scopes.push("project_id IS NULL");
    }
    if (query.projectIds.length > 0) {
      scopes.push("project_id IN (?)");
      values.push(query.projectIds);
    }
    if (scopes.length === 0) return [];

    const [rows] = await this.connection.query<TagRow[]>(
      `SELECT id, name, color, project_id, created_at, updated_at
       FROM tags
       WHERE ${scopes.join(" OR ")}
       ORDER BY name ASC, id ASC`,
      values,
    );
    return rows.map(mapTagRow);
  }

  async insertTag(tag: TagRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      `INSERT INTO tags (id, name, color, project_id, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        tag.id,
        tag.name,
        tag.color,
        tag.projectId,
        toDbDate(tag.createdAt),
        toDbDate(tag.updatedAt),
      ],
    );
  }

  async updateTag(tag: TagRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      "UPDATE tags SET name = ?, color = ?, updated_at = ? WHERE id = ?",
      [tag.name, tag.color, toDbDate(tag.updatedAt), tag.id],
    );
  }

  async deleteTag(id: string): Promise<void> {
    await this.connection.query<ResultSetHeader>("DELETE FROM task_tags WHERE tag_id = ?", [id]);
    await this.connection.query<ResultSetHeader>("DELETE FROM tags WHERE id = ?", [id]);
  }

  // --- Comments ---

  async findComment(id: string): Promise<CommentRecord | null> {
    const [rows] = await this.connection.query<CommentRow[]>(
      "SELECT * FROM comments WHERE id = ? LIMIT 1",
      [id],
    );
    return rows[0] ? mapCommentRow(rows[0]) : null;
  }

  async listComments(taskId: string): Promise<CommentRecord[]> {
    const [rows] = await this.connection.query<CommentRow[]>(
      "SELECT * FROM comments WHERE task_id = ? ORDER BY created_at ASC, id ASC",
      [taskId],
    );
    return rows.map(mapCommentRow);
  }

  async insertComment(comment: CommentRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      `INSERT INTO comments (id, task_id, author_id, content, is_edited, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        comment.id,
        comment.taskId,
        comment.authorId,
        comment.content,
        comment.isEdited ? 1 : 0,
        toDbDate(comment.createdAt),
        toDbDate(comment.updatedAt),
      ],
    );
  }

  async updateComment(comment: CommentRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      "UPDATE comments SET content = ?, is_edited = ?, updated_at = ? WHERE id = ?",
      [comment.content, comment.isEdited ? 1 : 0, toDbDate(comment.updatedAt), comment.id],
    );
  }

  async deleteComment(id: string): Promise<void> {
    await this.connection.query<ResultSetHeader>("DELETE FROM comments WHERE id = ?", [id]);
  }

  // --- Activity ---

  async insertActivity(entry: ActivityRecord): Promise<void> {
    await this.connection.query<ResultSetHeader>(
      `INSERT INTO activity_logs (id, user_id, project_id, task_id, action, details, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        entry.id,
        entry.userId,
        entry.projectId,
        entry.taskId,
        entry.action,
        JSON.stringify(entry.details),
        toDbDate(entry.createdAt),
      ],
    );
  }

  async listActivityForTask(taskId: string): Promise<ActivityRecord[]> {
    const [rows] = await this.connection.query<ActivityRow[]>(
      "SELECT * FROM activity_logs WHERE task_id = ? ORDER BY created_at DESC, id DESC",
      [taskId],
    );
    return rows.map(mapActivityRow);
  }

  async listActivityForProject(projectId: string, limit: number): Promise<ActivityRecord[]> {
    const [rows] = await this.connection.query<ActivityRow[]>(
      "SELECT * FROM activity_logs WHERE project_id = ? ORDER BY created_at DESC, id DESC LIMIT ?",
      [projectId, limit],
    );
    return rows.map(mapActivityRow);
  }

  private async loadTagIds(taskIds: string[]): Promise<Map<string, string[]>> {
    const byTask = new Map<string, string[]>();
    if (taskIds.length === 0) return byTask;

    const [rows] = await this.connection.query<TaskTagRow[]>(
      "SELECT task_id, tag_id FROM task_tags WHERE task_id IN (?) ORDER BY tag_id ASC",
      [taskIds],
    );

    for (const row of rows) {
      const list = byTask.get(row.task_id) ?? [];
      list.push(row.tag_id);
      byTask.set(row.task_id, list);
    }
    return byTask;
  }
}

export function translateDriverError(error: unknown): unknown {
  if (isAppError(error)) return error;

  const code = typeof error === "object" && error !== null && "code" in error ? error.code : null;
  if (typeof code === "string" && CONFLICT_CODES.has(code)) {
    return new ConflictError("WriteConflict", "Concurrent write conflict, retry the request");
  }
  return error;
}

function mapUserRow(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    displayName: row.display_name,
    avatarUrl: row.avatar_url,
    isActive: row.is_active === 1,
    lastLoginAt: toNullableIso(row.last_login_at),
    createdAt: toIsoTimestamp(row.created_at),
    updatedAt: toIsoTimestamp(row.updated_at),
  };
}

function mapProjectRow(row: ProjectRow): ProjectRecord {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    ownerId: row.owner_id,
    color: row.color,
    icon: row.icon,
    isArchived: row.is_archived === 1,
    createdAt: toIsoTimestamp(row.created_at),
    updatedAt: toIsoTimestamp(row.updated_at),
  };
}

function mapMemberRow(row: MemberRow): ProjectMemberRecord {
  return {
    projectId: row.project_id,
    userId: row.user_id,
    role: row.role,
    joinedAt: toIsoTimestamp(row.joined_at),
  };
}

function mapTaskRow(row: TaskRow, tagIds: string[]): TaskRecord {
  return {
    id: row.id,
    projectId: row.project_id,
    title: row.title,
    description: row.description,
    creatorId: row.creator_id,
    assigneeId: row.assignee_id,
    status: row.status,
    priority: row.priority,
    dueDate: toNullableIso(row.due_date),
    estimatedHours: row.estimated_hours,
    actualHours: row.actual_hours,
    completedAt: toNullableIso(row.completed_at),
    tagIds,
    createdAt: toIsoTimestamp(row.created_at),
    updatedAt: toIsoTimestamp(row.updated_at),
  };
}

function mapTagRow(row: TagRow): TagRecord {
  return {
    id: row.id,
    name: row.name,
    color: row.color,
    projectId: row.project_id,
    createdAt: toIsoTimestamp(row.created_at),
    updatedAt: toIsoTimestamp(row.updated_at),
  };
}

function mapCommentRow(row: CommentRow): CommentRecord {
  return {
    id: row.id,
    taskId: row.task_id,
    authorId: row.author_id,
    content: row.content,
    isEdited: row.is_edited === 1,
    createdAt: toIsoTimestamp(row.created_at),
    updatedAt: toIsoTimestamp(row.updated_at),
  };
}

function mapActivityRow(row: ActivityRow): ActivityRecord {
  return {
    id: row.id,
    userId: row.user_id,
    projectId: row.project_id,
    taskId: row.task_id,
    action: row.action,
    details: parseDetails(row.details),
    createdAt: toIsoTimestamp(row.created_at),
  };
}

function parseDetails(value: unknown): ActivityDetails {
  const parsed: unknown = typeof value === "string" ? JSON.parse(value) : value;
  return isDetailsObject(parsed) ? parsed : {};
}

function isDetailsObject(value: unknown): value is ActivityDetails {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function toDbDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toNullableIso(value: Date | string | null): string | null {
  return value === null ? null : toIsoTimestamp(value);
}

function toIsoTimestamp(value: Date | string): string {
  if (value instanceof Date) return value.toISOString();
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? String(value) : parsed.toISOString();
}
