export type MemberRole = "viewer" | "member" | "admin";
export type TaskStatus = "todo" | "in_progress" | "review" | "done";
export type TaskPriority = "low" | "medium" | "high" | "urgent";

export const MEMBER_ROLES: readonly MemberRole[] = ["viewer", "member", "admin"];
export const TASK_STATUSES: readonly TaskStatus[] = ["todo", "in_progress", "review", "done"];
export const TASK_PRIORITIES: readonly TaskPriority[] = ["low", "medium", "high", "urgent"];

export type ActivityAction =
  | "created"
  | "updated"
  | "deleted"
  | "completed"
  | "commented"
  | "assigned"
  | "status_changed"
  | "member_added"
  | "member_removed";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ActivityDetails = { [key: string]: JsonValue };

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  displayName: string | null;
  avatarUrl: string | null;
  isActive: boolean;
  lastLoginAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export type PublicUser = Omit<UserRecord, "passwordHash">;

export interface ProjectRecord {
  id: string;
  name: string;
  description: string | null;
  ownerId: string;
  color: string | null;
  icon: string | null;
  isArchived: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface ProjectMemberRecord {
  projectId: string;
  userId: string;
  role: MemberRole;
  joinedAt: string;
}

export interface TaskRecord {
  id: string;
  projectId: string;
  title: string;
  description: string | null;
  creatorId: string;
  assigneeId: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  dueDate: string | null;
  estimatedHours: number | null;
  actualHours: number | null;
  completedAt: string | null;
  tagIds: string[];
  createdAt: string;
  updatedAt: string;
}

export interface TagRecord {
  id: string;
  name: string;
  color: string | null;
  projectId: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface CommentRecord {
  id: string;
  taskId: string;
  authorId: string;
  content: string;
  isEdited: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface ActivityRecord {
  id: string;
  userId: string;
  projectId: string;
  taskId: string | null;
  action: ActivityAction;
  details: ActivityDetails;
  createdAt: string;
}

export function toPublicUser(user: UserRecord): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export function isMemberRole(value: unknown): value is MemberRole {
  return MEMBER_ROLES.some((role) => role === value);
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

export function isTaskPriority(value: unknown): value is TaskPriority {
  return TASK_PRIORITIES.some((priority) => priority === value);
}
