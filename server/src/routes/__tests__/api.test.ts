import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../../app.js";
import { createWorld, register, type World } from "../../__tests__/fixtures.js";

describe("HTTP API", () => {
  let world: World;
  let app: Express;
  let aliceToken: string;
  let bobToken: string;
  let bobId: string;

  const as = (token: string) => ({ Authorization: `Bearer ${token}` });

  beforeEach(() => {
    world = createWorld(1024);
    app = createApp(world.services, { allowedOrigins: ["http://localhost:5173"], maxUploadBytes: 1024 });
    aliceToken = register(world, "alice").token;
    const bob = register(world, "bob");
    bobToken = bob.token;
    bobId = bob.user.id;
  });

  async function createTeamWithBob(): Promise<string> {
    const team = await request(app).post("/api/teams").set(as(aliceToken)).send({ name: "Platform" });
    await request(app).post(`/api/teams/${team.body.id}/members`).set(as(aliceToken)).send({ username: "bob" });
    return team.body.id;
  }

  describe("authentication", () => {
    it("serves health without a token", async () => {
      const res = await request(app).get("/api/health");
      expect(res.status).toBe(200);
      expect(res.body.ok).toBe(true);
    });

    it("rejects API calls without a valid token", async () => {
      expect((await request(app).get("/api/teams")).status).toBe(401);
      const res = await request(app).get("/api/teams").set(as("wrong"));
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: "Unauthorized" });
    });

    it("registers a user without authentication", async () => {
      const res = await request(app).post("/api/users").send({ username: "carol", email: "carol@example.com" });

      expect(res.status).toBe(201);
      expect(res.body.user).toEqual({ id: expect.any(String), username: "carol", email: "carol@example.com" });
      const me = await request(app).get("/api/auth/me").set(as(res.body.token));
      expect(me.body.username).toBe("carol");
    });

    it("answers a taken username with 409", async () => {
      const res = await request(app).post("/api/users").send({ username: "alice", email: "a2@example.com" });
      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: 'Username "alice" is already taken' });
    });

    it("logs in with a token and then accepts the cookie", async () => {
      const login = await request(app).post("/api/auth/login").send({ token: aliceToken });
      expect(login.status).toBe(200);
      const cookies: unknown = login.headers["set-cookie"];
      expect(cookies).toEqual([expect.stringMatching(new RegExp(`^teamboard-auth=${aliceToken};`))]);

      const me = await request(app).get("/api/auth/me").set("Cookie", `teamboard-auth=${aliceToken}`);
      expect(me.status).toBe(200);
      expect(me.body.username).toBe("alice");
    });

    it("rejects a login with an unknown token", async () => {
      const res = await request(app).post("/api/auth/login").send({ token: "test-secret" });
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: "Invalid token" });
    });
  });

  describe("teams and tasks", () => {
    it("creates a team and lists it for its members", async () => {
      const teamId = await createTeamWithBob();

      const teams = await request(app).get("/api/teams").set(as(bobToken));
      expect(teams.body.map((t: { id: string }) => t.id)).toEqual([teamId]);

      const members = await request(app).get(`/api/teams/${teamId}/members`).set(as(bobToken));
      expect(members.body.map((m: { user: { username: string }; role: string }) => [m.user.username, m.role])).toEqual([
        ["alice", "OWNER"],
        ["bob", "MEMBER"],
      ]);
    });

    it("maps service errors to status codes", async () => {
      const teamId = await createTeamWithBob();

      const invalid = await request(app).post("/api/tasks").set(as(aliceToken)).send({ teamId, title: "ab" });
      expect(invalid.status).toBe(400);
      expect(invalid.body).toEqual({ error: "title: Task title must be at least 3 characters long." });

      const denied = await request(app).delete(`/api/teams/${teamId}`).set(as(bobToken));
      expect(denied.status).toBe(403);
      expect(denied.body).toEqual({ error: "You do not have permission to delete this team." });

      const missing = await request(app).get("/api/tasks/nope").set(as(aliceToken));
      expect(missing.status).toBe(404);
      expect(missing.body).toEqual({ error: "Task not found" });

      const aliceId = world.services.users.findByUsername("alice")?.id;
      const lastOwner = await request(app).delete(`/api/teams/${teamId}/members/${aliceId}`).set(as(aliceToken));
      expect(lastOwner.status).toBe(409);
    });

    it("creates, updates and reports activity on a task", async () => {
      const teamId = await createTeamWithBob();
      const created = await request(app)
        .post("/api/tasks")
        .set(as(aliceToken))
        .send({ teamId, title: "Fix bug", assigneeId: bobId });
      expect(created.status).toBe(201);

      const updated = await request(app)
        .patch(`/api/tasks/${created.body.id}`)
        .set(as(aliceToken))
        .send({ status: "DONE" });
      expect(updated.body.status).toBe("DONE");

      const activity = await request(app).get(`/api/tasks/${created.body.id}/activity`).set(as(bobToken));
      expect(activity.body.map((e: { action: string }) => e.action)).toEqual(["task_created", "status_changed"]);

      const listed = await request(app).get("/api/tasks?status=DONE").set(as(bobToken));
      expect(listed.body.map((t: { id: string }) => t.id)).toEqual([created.body.id]);
    });

    it("answers malformed JSON with 400", async () => {
      const res = await request(app)
        .post("/api/teams")
        .set(as(aliceToken))
        .set("Content-Type", "application/json")
        .send("{ not json");
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Malformed JSON body" });
    });

    it("answers unknown API paths with 404", async () => {
      const res = await request(app).get("/api/nothing-here").set(as(aliceToken));
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Not found" });
    });
  });

  describe("comments", () => {
    it("posts replies and returns the thread", async () => {
      const teamId = await createTeamWithBob();
      const task = await request(app).post("/api/tasks").set(as(aliceToken)).send({ teamId, title: "Fix bug" });
      const root = await request(app)
        .post(`/api/tasks/${task.body.id}/comments`)
        .set(as(aliceToken))
        .send({ content: "@bob thoughts?" });
      expect(root.status).toBe(201);
      await request(app)
        .post(`/api/tasks/${task.body.id}/comments`)
        .set(as(bobToken))
        .send({ content: "looks fine", parentId: root.body.id });

      const thread = await request(app).get(`/api/tasks/${task.body.id}/comments`).set(as(bobToken));
      expect(thread.body).toHaveLength(1);
      expect(thread.body[0].comment.content).toBe("@bob thoughts?");
      expect(thread.body[0].html).toBe('<span class="mention">@bob</span> thoughts?');
      expect(thread.body[0].replies[0].comment.content).toBe("looks fine");

      const removed = await request(app).delete(`/api/comments/${root.body.id}`).set(as(aliceToken));
      expect(removed.body).toEqual({ ok: true });
      const empty = await request(app).get(`/api/tasks/${task.body.id}/comments`).set(as(bobToken));
      expect(empty.body).toEqual([]);
    });
  });

  describe("attachments", () => {
    it("uploads, downloads and deletes a file", async () => {
      const teamId = await createTeamWithBob();
      const task = await request(app).post("/api/tasks").set(as(aliceToken)).send({ teamId, title: "Fix bug" });

      const uploaded = await request(app)
        .post(`/api/attachments/task/${task.body.id}`)
        .set(as(bobToken))
        .attach("file", Buffer.from("hello"), "notes.txt");
      expect(uploaded.status).toBe(201);
      expect(uploaded.body).toMatchObject({ filename: "notes.txt", size: 5 });

      const listed = await request(app).get(`/api/attachments/task/${task.body.id}`).set(as(aliceToken));
      expect(listed.body.map((a: { filename: string }) => a.filename)).toEqual(["notes.txt"]);

      const downloaded = await request(app).get(`/api/attachments/${uploaded.body.id}`).set(as(aliceToken));
      expect(downloaded.status).toBe(200);
      expect(downloaded.headers["content-disposition"]).toBe('attachment; filename="notes.txt"');
      expect(downloaded.text).toBe("hello");

      const removed = await request(app).delete(`/api/attachments/${uploaded.body.id}`).set(as(bobToken));
      expect(removed.body).toEqual({ ok: true });
      expect(world.files.files.size).toBe(0);
    });

    it("rejects oversized uploads, missing files and unknown target kinds", async () => {
      const teamId = await createTeamWithBob();
      const task = await request(app).post("/api/tasks").set(as(aliceToken)).send({ teamId, title: "Fix bug" });

      const big = await request(app)
        .post(`/api/attachments/task/${task.body.id}`)
        .set(as(bobToken))
        .attach("file", Buffer.alloc(1025, 1), "big.bin");
      expect(big.status).toBe(400);
      expect(big.body).toEqual({ error: "File exceeds the 1024 byte upload limit." });

      const none = await request(app).post(`/api/attachments/task/${task.body.id}`).set(as(bobToken));
      expect(none.status).toBe(400);
      expect(none.body).toEqual({ error: 'No file provided (expected multipart field "file").' });

      const badKind = await request(app)
        .post(`/api/attachments/team/${teamId}`)
        .set(as(bobToken))
        .attach("file", Buffer.from("x"), "x.txt");
      expect(badKind.status).toBe(400);
    });

    it("rate-limits uploads without counting listings and downloads", async () => {
      app = createApp(world.services, {
        allowedOrigins: ["http://localhost:5173"],
        maxUploadBytes: 1024,
        uploadsPerHour: 1,
      });
      const teamId = await createTeamWithBob();
      const task = await request(app).post("/api/tasks").set(as(aliceToken)).send({ teamId, title: "Fix bug" });
      const uploadTo = `/api/attachments/task/${task.body.id}`;

      const first = await request(app).post(uploadTo).set(as(bobToken)).attach("file", Buffer.from("one"), "one.txt");
      expect(first.status).toBe(201);

      for (let i = 0; i < 3; i++) {
        const listed = await request(app).get(uploadTo).set(as(aliceToken));
        expect(listed.status).toBe(200);
        const downloaded = await request(app).get(`/api/attachments/${first.body.id}`).set(as(aliceToken));
        expect(downloaded.status).toBe(200);
      }

      const second = await request(app).post(uploadTo).set(as(bobToken)).attach("file", Buffer.from("two"), "two.txt");
      expect(second.status).toBe(429);
      expect(second.body).toEqual({ error: "Upload limit reached — try again later" });
      expect(world.db.tables.attachments.map((a) => a.filename)).toEqual(["one.txt"]);
    });
  });

  describe("notifications", () => {
    it("lists, counts and marks notifications read", async () => {
      const teamId = await createTeamWithBob();
      const task = await request(app)
        .post("/api/tasks")
        .set(as(aliceToken))
        .send({ teamId, title: "Fix bug", assigneeId: bobId });

      const list = await request(app).get("/api/notifications").set(as(bobToken));
      expect(list.body).toHaveLength(1);
      expect(list.body[0]).toMatchObject({
        kind: "assignment",
        message: "alice assigned you to task 'Fix bug'",
        read: false,
        relatedExists: true,
      });
      const id: string = list.body[0].id;

      expect((await request(app).get("/api/notifications/unread-count").set(as(bobToken))).body).toEqual({ count: 1 });
      expect((await request(app).post(`/api/notifications/${id}/read`).set(as(aliceToken))).status).toBe(404);

      const read = await request(app).post(`/api/notifications/${id}/read`).set(as(bobToken));
      expect(read.body.read).toBe(true);
      expect((await request(app).get("/api/notifications/unread-count").set(as(bobToken))).body).toEqual({ count: 0 });

      await request(app).delete(`/api/tasks/${task.body.id}`).set(as(aliceToken));
      const after = await request(app).get("/api/notifications").set(as(bobToken));
      expect(after.body[0].relatedExists).toBe(false);
    });

    it("marks everything read at once", async () => {
      const teamId = await createTeamWithBob();
      await request(app).post("/api/tasks").set(as(aliceToken)).send({ teamId, title: "First task", assigneeId: bobId });
      await request(app).post("/api/tasks").set(as(aliceToken)).send({ teamId, title: "Second task", assigneeId: bobId });

      const res = await request(app).post("/api/notifications/read-all").set(as(bobToken));
      expect(res.body).toEqual({ updated: 2 });
    });
  });
});
