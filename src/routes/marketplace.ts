import { Router } from "express";
import { z } from "zod";
import { Marketplace } from "../marketplace/marketplace";
import { SettingsStore } from "../settings/settings-store";
import { NotConfiguredError } from "../errors";
import { parseInput } from "../middleware/validate";

export interface MarketplaceRouteDeps {
  marketplace: Pick<Marketplace, "search" | "install" | "repositories">;
  settings: Pick<SettingsStore, "addRepository" | "removeRepository">;
  extensionsDir?: string;
}

const searchQuerySchema = z.object({
  query: z.string().optional(),
});

const httpsUrl = z
  .string()
  .url()
  .refine((value) => value.startsWith("https://"), "must be an https URL");

const installBodySchema = z.object({
  name: z.string().min(1),
  downloadUrl: httpsUrl,
});

const repositoryBodySchema = z.object({
  url: httpsUrl,
});

const repositoryQuerySchema = z.object({
  url: z.string().min(1),
});

export function createMarketplaceRouter(deps: MarketplaceRouteDeps): Router {
  const router = Router();

  router.get("/extensions", async (req, res, next) => {
    try {
      const { query } = parseInput(searchQuerySchema, req.query);
      const extensions = await deps.marketplace.search(query ?? "");
      res.json({ extensions });
    } catch (error) {
      next(error);
    }
  });

  router.post("/extensions/install", async (req, res, next) => {
    try {
      const extension = parseInput(installBodySchema, req.body);
      if (!deps.extensionsDir) {
        throw new NotConfiguredError("EXTENSIONS_DIR");
      }
      const written = await deps.marketplace.install(extension, deps.extensionsDir);
      res.status(201).json({ path: written });
    } catch (error) {
      next(error);
    }
  });

  router.get("/repositories", async (_req, res, next) => {
    try {
      res.json({ repositories: await deps.marketplace.repositories() });
    } catch (error) {
      next(error);
    }
  });

  router.post("/repositories", async (req, res, next) => {
    try {
      const { url } = parseInput(repositoryBodySchema, req.body);
      await deps.settings.addRepository(url);
      res.status(201).json({ repositories: await deps.marketplace.repositories() });
    } catch (error) {
      next(error);
    }
  });

  router.delete("/repositories", async (req, res, next) => {
    try {
      const { url } = parseInput(repositoryQuerySchema, req.query);
      await deps.settings.removeRepository(url);
      res.json({ repositories: await deps.marketplace.repositories() });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
