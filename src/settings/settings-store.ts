import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { hasErrorCode, InvalidConfigurationError } from "../errors";
import { RepositorySource } from "../marketplace/marketplace";

const settingsSchema = z.object({
  customRepositories: z.array(z.string()).default([]),
  encryptedToken: z.string().optional(),
});

export type Settings = z.infer<typeof settingsSchema>;

/**
 * 사용자 설정을 JSON 파일 하나에 보관한다. 매 호출마다 파일을 다시 읽는다.
 * 변경 작업은 호출 순서대로 하나씩 실행된다.
 */
export class SettingsStore implements RepositorySource {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async load(): Promise<Settings> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return { customRepositories: [] };
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new InvalidConfigurationError(`Settings file is not valid JSON: ${this.filePath}`);
    }

    const parsed = settingsSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidConfigurationError(`Settings file is malformed: ${this.filePath}`);
    }
    return parsed.data;
  }

  async customRepositories(): Promise<string[]> {
    return (await this.load()).customRepositories;
  }

  addRepository(url: string): Promise<string[]> {
    return this.mutate(async () => {
      const settings = await this.load();
      if (!settings.customRepositories.includes(url)) {
        settings.customRepositories.push(url);
        await this.save(settings);
      }
      return settings.customRepositories;
    });
  }

  removeRepository(url: string): Promise<string[]> {
    return this.mutate(async () => {
      const settings = await this.load();
      settings.customRepositories = settings.customRepositories.filter((repo) => repo !== url);
      await this.save(settings);
      return settings.customRepositories;
    });
  }

  async encryptedToken(): Promise<string | undefined> {
    return (await this.load()).encryptedToken;
  }

  setEncryptedToken(encryptedToken: string | undefined): Promise<void> {
    return this.mutate(async () => {
      const settings = await this.load();
      await this.save({ ...settings, encryptedToken });
    });
  }

  // load-modify-save 가 서로 끼어들지 않도록 직렬화
  private mutate<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.tail.then(operation);
    this.tail = result.catch(() => undefined);
    return result;
  }

  private async save(settings: Settings): Promise<void> {
    await writeFile(this.filePath, `${JSON.stringify(settings, null, 2)}\n`, "utf-8");
  }
}
