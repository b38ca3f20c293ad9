import type { AppContext } from "../context.js";
import type { CommentRecord } from "../db/records.js";
import type { Repositories } from "../db/store.js";
import { AccessDeniedError, NotFoundError } from "../errors.js";
import { newId, nowIso } from "../util/ids.js";
import {
  assertCapability,
  hasCapability,
  requireTaskRole,
  type TaskAccess,
} from "./access.service.js";
import { logActivity } from "./activity.service.js";
import { commitMutation } from "./mutation.js";

const PREVIEW_LENGTH = 100;

export async function listComments(
  ctx: AppContext,
  actorId: string,
  taskId: string,
): Promise<CommentRecord[]> {
  return ctx.store.run(async (repos) => {
    await requireTaskRole(repos, actorId, taskId, "viewer");
    return repos.listComments(taskId);
  });
}

export async function addComment(
  ctx: AppContext,
  actorId: string,
  taskId: string,
  content: string,
): Promise<CommentRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { task } = await requireTaskRole(repos, actorId, taskId, "viewer");

    const at = nowIso();
    const comment: CommentRecord = {
      id: newId(),
      taskId: task.id,
      authorId: actorId,
      content,
      isEdited: false,
      createdAt: at,
      updatedAt: at,
    };
    await repos.insertComment(comment);

    await logActivity(repos, {
      actorId,
      projectId: task.projectId,
      taskId: task.id,
      action: "commented",
      details: { commentId: comment.id, preview: preview(content) },
    });
    events.project(task.projectId, "comment_added", {
      actorId,
      taskId: task.id,
      commentId: comment.id,
      comment,
    });
    return comment;
  });
}

/** Only the author may edit, and only while they can still see the project. */
export async function editComment(
  ctx: AppContext,
  actorId: string,
  commentId: string,
  content: string,
): Promise<CommentRecord> {
  return commitMutation(ctx, async (repos, events) => {
    const { comment, task, role } = await loadComment(repos, commentId, actorId);
    assertCapability(role, "viewer");
    if (comment.authorId !== actorId) {
      throw new AccessDeniedError("You can only edit your own comments", "NotCommentAuthor");
    }

    const updated: CommentRecord = { ...comment, content, isEdited: true, updatedAt: nowIso() };
    await repos.updateComment(updated);
    events.project(task.projectId, "comment_updated", {
      actorId,
      taskId: task.id,
      commentId: comment.id,
      comment: updated,
    });
    return updated;
  });
}

/** The author, or the project's owner or an admin, may delete. */
export async function deleteComment(
  ctx: AppContext,
  actorId: string,
  commentId: string,
): Promise<void> {
  await commitMutation(ctx, async (repos, events) => {
    const { comment, task, role } = await loadComment(repos, commentId, actorId);

    if (comment.authorId !== actorId && !hasCapability(role, "admin")) {
      throw new AccessDeniedError("Insufficient permissions to delete comment");
    }

    await repos.deleteComment(comment.id);
    events.project(task.projectId, "comment_deleted", {
      actorId,
      taskId: task.id,
      commentId: comment.id,
    });
  });
}

async function loadComment(
  repos: Repositories,
  commentId: string,
  actorId: string,
): Promise<TaskAccess & { comment: CommentRecord }> {
  const comment = await repos.findComment(commentId);
  if (!comment) {
    throw new NotFoundError("CommentNotFound", "Comment not found");
  }

  // "none" passes for everyone; the caller decides what the role permits.
  const access = await requireTaskRole(repos, actorId, comment.taskId, "none");
  return { ...access, comment };
}

/** First characters of the comment, counted in code points so emoji stay whole. */
function preview(content: string): string {
  return Array.from(content).slice(0, PREVIEW_LENGTH).join("");
}
