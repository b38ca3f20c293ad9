import type {
  ActivityRecord,
  CommentRecord,
  ProjectMemberRecord,
  ProjectRecord,
  TagRecord,
  TaskPriority,
  TaskRecord,
  TaskStatus,
  UserRecord,
} from "./records.js";

export interface LockOptions {
  /** Take a row lock that is held until the enclosing transaction ends. */
  forUpdate?: boolean;
}

export interface TaskFilters {
  status?: TaskStatus;
  priority?: TaskPriority;
  assigneeId?: string;
  search?: string;
}

export interface TaskQuery extends TaskFilters {
  projectIds: string[];
}

export interface TagScopeQuery {
  projectIds: string[];
  includeGlobal: boolean;
}

/**
 * Typed access to every table. One instance is bound to one database
 * connection, so all calls made through it share that connection's
 * transaction.
 *
 * Deletes that cascade run children before parents:
 * `deleteTask` removes task_tags, then comments, then the task;
 * `deleteTag` removes task_tags, then the tag.
 */
export interface Repositories {
  findUserById(id: string): Promise<UserRecord | null>;
  findUserByUsername(username: string): Promise<UserRecord | null>;
  findUserByEmail(email: string): Promise<UserRecord | null>;
  insertUser(user: UserRecord): Promise<void>;
  updateUser(user: UserRecord): Promise<void>;
  searchUsers(term: string, limit: number): Promise<UserRecord[]>;

  findProject(id: string, options?: LockOptions): Promise<ProjectRecord | null>;
  insertProject(project: ProjectRecord): Promise<void>;
  updateProject(project: ProjectRecord): Promise<void>;
  /** Owned projects plus projects with a member row, newest update first. */
  listProjectsForUser(userId: string, archived: boolean): Promise<ProjectRecord[]>;
  listAccessibleProjectIds(userId: string): Promise<string[]>;

  findMember(projectId: string, userId: string): Promise<ProjectMemberRecord | null>;
  listMembers(projectId: string): Promise<ProjectMemberRecord[]>;
  insertMember(member: ProjectMemberRecord): Promise<void>;
  updateMember(member: ProjectMemberRecord): Promise<void>;
  deleteMember(projectId: string, userId: string): Promise<void>;

  findTask(id: string, options?: LockOptions): Promise<TaskRecord | null>;
  listTasks(query: TaskQuery): Promise<TaskRecord[]>;
  /** Inserts the task row and its `tagIds` links. */
  insertTask(task: TaskRecord): Promise<void>;
  /** Writes the task's columns; tag links are left alone. */
  updateTask(task: TaskRecord): Promise<void>;
  deleteTask(id: string): Promise<void>;
  attachTags(taskId: string, tagIds: string[]): Promise<void>;
  detachTag(taskId: string, tagId: string): Promise<void>;
  replaceTags(taskId: string, tagIds: string[]): Promise<void>;

  findTag(id: string): Promise<TagRecord | null>;
  findTagByName(name: string, projectId: string | null): Promise<TagRecord | null>;
  listTags(query: TagScopeQuery): Promise<TagRecord[]>;
  insertTag(tag: TagRecord): Promise<void>;
  updateTag(tag: TagRecord): Promise<void>;
  deleteTag(id: string): Promise<void>;

  findComment(id: string): Promise<CommentRecord | null>;
  listComments(taskId: string): Promise<CommentRecord[]>;
  insertComment(comment: CommentRecord): Promise<void>;
  updateComment(comment: CommentRecord): Promise<void>;
  deleteComment(id: string): Promise<void>;

  insertActivity(entry: ActivityRecord): Promise<void>;
  /** Newest first. */
  listActivityForTask(taskId: string): Promise<ActivityRecord[]>;
  /** Newest first. */
  listActivityForProject(projectId: string, limit: number): Promise<ActivityRecord[]>;
}

export interface Store {
  /** Runs reads outside of an explicit transaction. */
  run<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
  /**
   * Runs `work` inside one transaction. Every write made through `repos`
   * commits together when `work` resolves, or none of them does when it
   * throws or the commit fails.
   */
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}
