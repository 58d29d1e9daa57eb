import { Router } from "express";
import { z } from "zod";
import { SettingsStore } from "../settings/settings-store";
import { GitHubClient } from "../github/github-client";
import { encryptToken } from "../settings/token-vault";
import { parseInput } from "../middleware/validate";

export interface SettingsRouteDeps {
  settings: Pick<SettingsStore, "setEncryptedToken">;
  githubClient: Pick<GitHubClient, "setToken">;
}

const tokenBodySchema = z.object({
  token: z.string().min(1),
  password: z.string().min(1),
});

export function createSettingsRouter(deps: SettingsRouteDeps): Router {
  const router = Router();

  // 토큰은 비밀번호로 암호화해 저장하고, 현재 프로세스에서는 바로 사용한다
  router.put("/token", async (req, res, next) => {
    try {
      const { token, password } = parseInput(tokenBodySchema, req.body);
      await deps.settings.setEncryptedToken(encryptToken(token, password));
      deps.githubClient.setToken(token);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  router.delete("/token", async (_req, res, next) => {
    try {
      await deps.settings.setEncryptedToken(undefined);
      deps.githubClient.setToken(undefined);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
