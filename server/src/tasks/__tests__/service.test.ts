import { describe, it, expect, beforeEach } from "vitest";
import type { User } from "../../db/schema.js";
import { AccessDeniedError, NotFoundError, ValidationError } from "../../errors.js";
import { BATCH_WINDOW_MS } from "../../notifications/dispatcher.js";
import type { TaskService } from "../service.js";
import { createWorld, register, type World } from "../../__tests__/fixtures.js";

describe("TaskService", () => {
  let world: World;
  let tasks: TaskService;
  let alice: User;
  let bob: User;
  let carol: User;
  let outsider: User;
  let teamId: string;

  beforeEach(() => {
    world = createWorld();
    tasks = world.services.tasks;
    alice = register(world, "alice").user;
    bob = register(world, "bob").user;
    carol = register(world, "carol").user;
    outsider = register(world, "outsider").user;
    teamId = world.services.teams.create(alice.id, { name: "Platform" }).id;
    world.services.teams.addMember(alice.id, teamId, { username: "bob" });
    world.services.teams.addMember(alice.id, teamId, { username: "carol" });
  });

  const notificationsFor = (user: User) =>
    world.services.ledger.listForRecipient(user.id).map((n) => `${n.kind}: ${n.message}`);

  describe("create", () => {
    it("creates a task with defaults and a creation entry in the activity log", async () => {
      const task = await tasks.create(bob.id, { teamId, title: "  Fix bug  " });

      expect(task).toMatchObject({
        teamId,
        title: "Fix bug",
        description: "",
        status: "TODO",
        deadline: null,
        assigneeId: null,
        createdBy: bob.id,
      });
      expect(tasks.activityFor(bob.id, task.id).map((e) => [e.action, e.detail])).toEqual([
        ["task_created", 'Created "Fix bug"'],
      ]);
    });

    it("validates the title length", async () => {
      await expect(tasks.create(alice.id, { teamId, title: "ab" })).rejects.toThrow(
        new ValidationError("title: Task title must be at least 3 characters long.")
      );
      await expect(tasks.create(alice.id, { teamId, title: "x".repeat(201) })).rejects.toThrow(
        new ValidationError("title: Task title must not exceed 200 characters.")
      );
    });

    it("rejects a deadline in the past but accepts today", async () => {
      await expect(tasks.create(alice.id, { teamId, title: "Fix bug", deadline: "2030-01-14" })).rejects.toThrow(
        new ValidationError("Deadline cannot be in the past.")
      );
      const task = await tasks.create(alice.id, { teamId, title: "Fix bug", deadline: "2030-01-15" });
      expect(task.deadline).toBe("2030-01-15");
    });

    it("rejects calendar dates that do not exist", async () => {
      await expect(tasks.create(alice.id, { teamId, title: "Fix bug", deadline: "2030-02-31" })).rejects.toThrow(
        new ValidationError("deadline: deadline is not a valid date")
      );
      const task = await tasks.create(alice.id, { teamId, title: "Fix bug", deadline: "2032-02-29" });
      expect(task.deadline).toBe("2032-02-29");
      expect(world.db.tables.tasks).toHaveLength(1);
    });

    it("requires the creator to be a team member", async () => {
      await expect(tasks.create(outsider.id, { teamId, title: "Sneak in" })).rejects.toThrow(
        new AccessDeniedError("You must be a member of this team to create tasks.")
      );
      await expect(tasks.create(alice.id, { teamId: "missing", title: "Fix bug" })).rejects.toThrow(NotFoundError);
      expect(world.db.tables.tasks).toHaveLength(0);
    });

    it("requires the assignee to be a team member", async () => {
      await expect(
        tasks.create(alice.id, { teamId, title: "Fix bug", assigneeId: outsider.id })
      ).rejects.toThrow(new ValidationError("The assigned user must be a member of the selected team."));
    });

    it("notifies the assignee and mentioned members", async () => {
      await tasks.create(alice.id, {
        teamId,
        title: "Fix bug",
        description: "cc @carol and @outsider",
        assigneeId: bob.id,
      });

      expect(notificationsFor(bob)).toEqual(["assignment: alice assigned you to task 'Fix bug'"]);
      expect(notificationsFor(carol)).toEqual(["mention: alice mentioned you in task 'Fix bug'"]);
      expect(notificationsFor(outsider)).toEqual([]);
    });

    it("does not notify users about their own actions", async () => {
      await tasks.create(alice.id, { teamId, title: "Fix bug", description: "note to @alice", assigneeId: alice.id });
      expect(notificationsFor(alice)).toEqual([]);
      expect(world.transport.sent).toEqual([]);
    });

    it("gives the creator edit rights and other members view rights", async () => {
      const task = await tasks.create(bob.id, { teamId, title: "Fix bug" });
      const target = { kind: "task" as const, id: task.id };

      expect(world.services.permissions.permissionsFor(bob.id, target)).toEqual(["view", "change", "delete"]);
      expect(world.services.permissions.permissionsFor(carol.id, target)).toEqual(["view"]);
      expect(world.services.permissions.permissionsFor(alice.id, target)).toEqual(["view", "change", "delete"]);
    });
  });

  describe("read", () => {
    it("lists visible tasks newest first with optional filters", async () => {
      const first = await tasks.create(alice.id, { teamId, title: "First task" });
      world.clock.advance(1000);
      const second = await tasks.create(alice.id, { teamId, title: "Second task", status: "DONE" });

      expect(tasks.list(bob.id).map((t) => t.id)).toEqual([second.id, first.id]);
      expect(tasks.list(bob.id, { status: "DONE" }).map((t) => t.id)).toEqual([second.id]);
      expect(tasks.list(bob.id, { teamId: "other" })).toEqual([]);
      expect(tasks.list(outsider.id)).toEqual([]);
    });

    it("hides a task from non-members", async () => {
      const task = await tasks.create(alice.id, { teamId, title: "Fix bug" });
      expect(() => tasks.get(outsider.id, task.id)).toThrow(AccessDeniedError);
      expect(() => tasks.activityFor(outsider.id, task.id)).toThrow(AccessDeniedError);
      expect(() => tasks.get(alice.id, "missing")).toThrow(new NotFoundError("Task"));
    });
  });

  describe("update", () => {
    it("logs one activity entry per changed concern", async () => {
      const task = await tasks.create(alice.id, { teamId, title: "Fix bug" });
      world.clock.advance(1000);

      await tasks.update(alice.id, task.id, { title: "Fix the bug", status: "IN_PROGRESS", assigneeId: bob.id });

      expect(tasks.activityFor(alice.id, task.id).map((e) => [e.action, e.detail])).toEqual([
        ["task_created", 'Created "Fix bug"'],
        ["status_changed", "TODO → IN_PROGRESS"],
        ["assignment_changed", "unassigned → bob"],
        ["task_updated", "Changed title"],
      ]);
      expect(tasks.get(alice.id, task.id).updatedAt).toBe("2030-01-15T09:00:01.000Z");
    });

    it("leaves the task untouched when nothing changes", async () => {
      const task = await tasks.create(alice.id, { teamId, title: "Fix bug" });
      world.clock.advance(1000);

      await tasks.update(alice.id, task.id, { title: "Fix bug", status: "TODO" });

      expect(tasks.get(alice.id, task.id).updatedAt).toBe("2030-01-15T09:00:00.000Z");
      expect(tasks.activityFor(alice.id, task.id)).toHaveLength(1);
    });

    it("rejects a patch to a date that does not exist", async () => {
      const task = await tasks.create(alice.id, { teamId, title: "Fix bug", deadline: "2030-02-28" });

      await expect(tasks.update(alice.id, task.id, { deadline: "2030-02-31" })).rejects.toThrow(
        new ValidationError("deadline: deadline is not a valid date")
      );
      expect(tasks.get(alice.id, task.id).deadline).toBe("2030-02-28");
    });

    it("only lets the creator and owners edit", async () => {
      const task = await tasks.create(bob.id, { teamId, title: "Fix bug" });

      await expect(tasks.update(carol.id, task.id, { status: "DONE" })).rejects.toThrow(AccessDeniedError);
      await tasks.update(alice.id, task.id, { status: "DONE" });
      expect(tasks.get(carol.id, task.id).status).toBe("DONE");
    });

    it("notifies a new assignee and only newly mentioned members", async () => {
      const task = await tasks.create(alice.id, { teamId, title: "Fix bug", description: "ask @carol" });

      await tasks.update(alice.id, task.id, { description: "ask @carol and @bob", assigneeId: carol.id });

      expect(notificationsFor(bob)).toEqual(["mention: alice mentioned you in task 'Fix bug'"]);
      expect(notificationsFor(carol)).toEqual([
        "mention: alice mentioned you in task 'Fix bug'",
        "assignment: alice assigned you to task 'Fix bug'",
      ]);
    });

    it("rejects unassignable users without writing anything", async () => {
      const task = await tasks.create(alice.id, { teamId, title: "Fix bug" });

      await expect(tasks.update(alice.id, task.id, { title: "Renamed", assigneeId: outsider.id })).rejects.toThrow(
        ValidationError
      );
      expect(tasks.get(alice.id, task.id).title).toBe("Fix bug");
    });
  });

  describe("delete", () => {
    it("removes comments, attachments and activity but keeps notifications", async () => {
      const task = await tasks.create(alice.id, { teamId, title: "Fix bug", assigneeId: bob.id });
      const comment = await world.services.comments.create(bob.id, task.id, { content: "@alice done?" });
      world.services.attachments.upload(bob.id, { kind: "comment", id: comment.id }, {
        originalName: "log.txt",
        data: Buffer.from("trace"),
      });
      world.services.attachments.upload(alice.id, { kind: "task", id: task.id }, {
        originalName: "spec.txt",
        data: Buffer.from("notes"),
      });

      expect(() => tasks.delete(carol.id, task.id)).toThrow(AccessDeniedError);
      tasks.delete(alice.id, task.id);

      const t = world.db.tables;
      expect([t.tasks, t.comments, t.attachments, t.activity]).toEqual([[], [], [], []]);
      expect(world.files.files.size).toBe(0);
      expect(t.notifications.map((n) => n.kind)).toEqual(["assignment", "mention"]);
    });
  });

  it("batches the assignment and mention that follow each other within the window", async () => {
    const task = await tasks.create(alice.id, { teamId, title: "Fix bug", assigneeId: bob.id });
    world.clock.advance(60_000);
    await world.services.comments.create(alice.id, task.id, { content: "@bob please check" });
    world.clock.advance(60_000);
    await tasks.update(alice.id, task.id, { status: "DONE" });

    expect(world.transport.to("bob@example.com").map((m) => m.subject)).toEqual([
      "You were assigned a task by alice",
    ]);
    expect(tasks.activityFor(alice.id, task.id).map((e) => e.action)).toEqual([
      "task_created",
      "comment_added",
      "status_changed",
    ]);

    world.clock.advance(BATCH_WINDOW_MS);
    await world.services.dispatcher.sweep();

    expect(world.transport.to("bob@example.com")).toEqual([
      {
        to: "bob@example.com",
        subject: "You were assigned a task by alice",
        body: "alice assigned you to task 'Fix bug'",
      },
      {
        to: "bob@example.com",
        subject: "You have 2 new notifications",
        body: "- alice assigned you to task 'Fix bug'\n- alice mentioned you in a comment on 'Fix bug'",
      },
    ]);
  });
});
