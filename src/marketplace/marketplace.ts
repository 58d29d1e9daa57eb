import path from "node:path";
import { writeFile } from "node:fs/promises";
import { z } from "zod";
import { GitHubClient } from "../github/github-client";
import { RequestValidationError } from "../errors";

export const DEFAULT_EXTENSION_REPOSITORIES = [
  "https://api.github.com/repos/spicetify/spicetify-extensions/contents/Extensions",
];

// GitHub contents API 항목 중 필요한 필드만
const contentsSchema = z.array(
  z.object({
    name: z.string(),
    download_url: z.string().nullable(),
  })
);

export interface MarketplaceExtension {
  name: string;
  downloadUrl: string;
  repository: string;
}

export interface RepositorySource {
  customRepositories(): Promise<string[]>;
}

export class Marketplace {
  constructor(
    private readonly client: GitHubClient,
    private readonly source: RepositorySource
  ) {}

  async repositories(): Promise<string[]> {
    return [...DEFAULT_EXTENSION_REPOSITORIES, ...(await this.source.customRepositories())];
  }

  async search(query: string): Promise<MarketplaceExtension[]> {
    const needle = query.toLowerCase();
    const results: MarketplaceExtension[] = [];

    // 저장소 순서대로, 하나라도 실패하면 전체 실패
    for (const repository of await this.repositories()) {
      const items = await this.client.getJson(repository, contentsSchema);
      for (const item of items) {
        if (
          item.download_url !== null &&
          item.name.endsWith(".js") &&
          item.name.toLowerCase().includes(needle)
        ) {
          results.push({
            name: item.name,
            downloadUrl: item.download_url,
            repository,
          });
        }
      }
    }

    return results;
  }

  async install(
    extension: Pick<MarketplaceExtension, "name" | "downloadUrl">,
    extensionsDir: string
  ): Promise<string> {
    if (path.basename(extension.name) !== extension.name || !extension.name.endsWith(".js")) {
      throw new RequestValidationError(`Invalid extension file name: ${extension.name}`);
    }

    const source = await this.client.getText(extension.downloadUrl);
    const target = path.join(extensionsDir, extension.name);
    await writeFile(target, source, "utf-8");
    return target;
  }
}
