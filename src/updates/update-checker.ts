import { z } from "zod";
import { GitHubClient } from "../github/github-client";
import { CliTool } from "../cli/cli-tool";

export const CLI_RELEASES_URL =
  "https://api.github.com/repos/spicetify/spicetify-cli/releases/latest";

const releaseSchema = z.object({
  tag_name: z.string(),
  html_url: z.string(),
});

export interface UpdateStatus {
  component: "cli" | "app";
  currentVersion: string;
  latestVersion: string;
  updateAvailable: boolean;
  releaseUrl: string;
}

export interface UpdateCheckerOptions {
  appVersion: string;
  appReleasesUrl?: string;
}

function stripV(value: string): string {
  return value.trim().replace(/^v+|v+$/g, "");
}

export function parseCliVersion(output: string): string {
  const match = /v?(\d+\.\d+\.\d+)/.exec(output);
  return match ? match[1] : stripV(output);
}

export class UpdateChecker {
  constructor(
    private readonly client: GitHubClient,
    private readonly cli: CliTool,
    private readonly options: UpdateCheckerOptions
  ) {}

  async check(): Promise<UpdateStatus[]> {
    const statuses = [
      await this.compare("cli", parseCliVersion(await this.cli.version()), CLI_RELEASES_URL),
    ];

    if (this.options.appReleasesUrl) {
      statuses.push(
        await this.compare("app", stripV(this.options.appVersion), this.options.appReleasesUrl)
      );
    }
    return statuses;
  }

  private async compare(
    component: UpdateStatus["component"],
    currentVersion: string,
    releasesUrl: string
  ): Promise<UpdateStatus> {
    const release = await this.client.getJson(releasesUrl, releaseSchema);
    const latestVersion = stripV(release.tag_name);
    return {
      component,
      currentVersion,
      latestVersion,
      updateAvailable: currentVersion !== latestVersion,
      releaseUrl: release.html_url,
    };
  }
}
