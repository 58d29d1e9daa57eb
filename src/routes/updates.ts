import { Router } from "express";
import { UpdateChecker } from "../updates/update-checker";

export interface UpdatesRouteDeps {
  updateChecker: Pick<UpdateChecker, "check">;
}

export function createUpdatesRouter(deps: UpdatesRouteDeps): Router {
  const router = Router();

  router.get("/", async (_req, res, next) => {
    try {
      res.json({ updates: await deps.updateChecker.check() });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
