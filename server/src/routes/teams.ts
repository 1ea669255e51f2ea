import { Router } from "express";
import { requireUser } from "../auth.js";
import type { TeamService } from "../teams/service.js";
import { handle, param } from "./helpers.js";

export function createTeamsRouter(teams: TeamService): Router {
  const router = Router();

  // GET /: teams the caller belongs to
  router.get(
    "/",
    handle("teams", (req, res) => {
      res.json(teams.listForUser(requireUser(req).id));
    })
  );

  // POST /: create a team; the caller becomes its owner
  router.post(
    "/",
    handle("teams", (req, res) => {
      res.status(201).json(teams.create(requireUser(req).id, req.body));
    })
  );

  router.get(
    "/:id",
    handle("teams", (req, res) => {
      res.json(teams.get(requireUser(req).id, param(req, "id")));
    })
  );

  router.patch(
    "/:id",
    handle("teams", (req, res) => {
      res.json(teams.update(requireUser(req).id, param(req, "id"), req.body));
    })
  );

  router.delete(
    "/:id",
    handle("teams", (req, res) => {
      teams.delete(requireUser(req).id, param(req, "id"));
      res.json({ ok: true });
    })
  );

  // ---- Members ----

  router.get(
    "/:id/members",
    handle("teams", (req, res) => {
      res.json(teams.listMembers(requireUser(req).id, param(req, "id")));
    })
  );

  // POST /:id/members  { username, role? }
  router.post(
    "/:id/members",
    handle("teams", (req, res) => {
      res.status(201).json(teams.addMember(requireUser(req).id, param(req, "id"), req.body));
    })
  );

  // PATCH /:id/members/:userId  { role }
  router.patch(
    "/:id/members/:userId",
    handle("teams", (req, res) => {
      res.json(teams.changeRole(requireUser(req).id, param(req, "id"), param(req, "userId"), req.body));
    })
  );

  router.delete(
    "/:id/members/:userId",
    handle("teams", (req, res) => {
      teams.removeMember(requireUser(req).id, param(req, "id"), param(req, "userId"));
      res.json({ ok: true });
    })
  );

  return router;
}
