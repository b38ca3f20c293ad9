import type { AppContext } from "../../src/context.js";
import type {
  MemberRole,
  ProjectRecord,
  TagRecord,
  UserRecord,
} from "../../src/db/records.js";
import { MemoryStore } from "./memory-store.js";
import { RecordingBroadcaster } from "./recording-broadcaster.js";

export const SEED_TIME = "2026-01-05T09:00:00.000Z";

export const OWNER_ID = "00000000-0000-4000-8000-000000000001";
export const ADMIN_ID = "00000000-0000-4000-8000-000000000002";
export const MEMBER_ID = "00000000-0000-4000-8000-000000000003";
export const VIEWER_ID = "00000000-0000-4000-8000-000000000004";
export const OUTSIDER_ID = "00000000-0000-4000-8000-000000000005";
export const INACTIVE_ID = "00000000-0000-4000-8000-000000000006";

export const PROJECT_ID = "10000000-0000-4000-8000-000000000001";
export const OTHER_PROJECT_ID = "10000000-0000-4000-8000-000000000002";

export const GLOBAL_TAG_ID = "20000000-0000-4000-8000-000000000001";
export const PROJECT_TAG_ID = "20000000-0000-4000-8000-000000000002";
export const FOREIGN_TAG_ID = "20000000-0000-4000-8000-000000000003";

export const MISSING_ID = "90000000-0000-4000-8000-000000000009";

export interface TestContext extends AppContext {
  store: MemoryStore;
  broadcaster: RecordingBroadcaster;
}

export function createTestContext(): TestContext {
  return { store: new MemoryStore(), broadcaster: new RecordingBroadcaster() };
}

export function seedUser(
  store: MemoryStore,
  id: string,
  username: string,
  overrides: Partial<UserRecord> = {},
): UserRecord {
  const user: UserRecord = {
    id,
    username,
    email: `${username}@example.com`,
    passwordHash: "not-a-real-hash",
    displayName: null,
    avatarUrl: null,
    isActive: true,
    lastLoginAt: null,
    createdAt: SEED_TIME,
    updatedAt: SEED_TIME,
    ...overrides,
  };
  store.tables.users.set(id, user);
  return user;
}

export function seedProject(
  store: MemoryStore,
  id: string,
  ownerId: string,
  overrides: Partial<ProjectRecord> = {},
): ProjectRecord {
  const project: ProjectRecord = {
    id,
    name: "Launch",
    description: null,
    ownerId,
    color: null,
    icon: null,
    isArchived: false,
    createdAt: SEED_TIME,
    updatedAt: SEED_TIME,
    ...overrides,
  };
  store.tables.projects.set(id, project);
  return project;
}

export function seedMember(
  store: MemoryStore,
  projectId: string,
  userId: string,
  role: MemberRole,
): void {
  store.tables.members.set(`${projectId}:${userId}`, {
    projectId,
    userId,
    role,
    joinedAt: SEED_TIME,
  });
}

export function seedTag(
  store: MemoryStore,
  id: string,
  name: string,
  projectId: string | null,
): TagRecord {
  const tag: TagRecord = {
    id,
    name,
    color: null,
    projectId,
    createdAt: SEED_TIME,
    updatedAt: SEED_TIME,
  };
  store.tables.tags.set(id, tag);
  return tag;
}

/**
 * One project owned by `owner` with an admin, a member and a viewer, a second
 * project owned by the outsider, and a global, a local and a foreign tag.
 */
export function seedWorkspace(store: MemoryStore): void {
  seedUser(store, OWNER_ID, "olivia");
  seedUser(store, ADMIN_ID, "adam");
  seedUser(store, MEMBER_ID, "maria");
  seedUser(store, VIEWER_ID, "victor");
  seedUser(store, OUTSIDER_ID, "oscar");
  seedUser(store, INACTIVE_ID, "ivan", { isActive: false });

  seedProject(store, PROJECT_ID, OWNER_ID);
  seedProject(store, OTHER_PROJECT_ID, OUTSIDER_ID, { name: "Elsewhere" });

  seedMember(store, PROJECT_ID, ADMIN_ID, "admin");
  seedMember(store, PROJECT_ID, MEMBER_ID, "member");
  seedMember(store, PROJECT_ID, VIEWER_ID, "viewer");

  seedTag(store, GLOBAL_TAG_ID, "urgent", null);
  seedTag(store, PROJECT_TAG_ID, "backend", PROJECT_ID);
  seedTag(store, FOREIGN_TAG_ID, "design", OTHER_PROJECT_ID);
}
