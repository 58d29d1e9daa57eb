import { Logger } from "../logger";
import { TokenDecryptionError } from "../errors";
import { SettingsStore } from "./settings-store";
import { decryptToken } from "./token-vault";

export interface TokenSources {
  plainToken?: string;
  password?: string;
}

/**
 * 시작 시 사용할 GitHub 토큰을 결정한다. 평문 토큰이 우선이며,
 * 저장된 토큰을 풀 수 없으면 경고만 남기고 인증 없이 진행한다.
 */
export async function resolveToken(
  settings: Pick<SettingsStore, "encryptedToken">,
  sources: TokenSources,
  logger: Logger
): Promise<string | undefined> {
  if (sources.plainToken) {
    return sources.plainToken;
  }
  const encrypted = await settings.encryptedToken();
  if (!encrypted) {
    return undefined;
  }
  if (!sources.password) {
    logger.warn("stored GitHub token ignored: GITHUB_TOKEN_PASSWORD is not set");
    return undefined;
  }

  try {
    return decryptToken(encrypted, sources.password);
  } catch (error) {
    if (error instanceof TokenDecryptionError) {
      logger.warn({ err: error }, "stored GitHub token ignored: could not decrypt it");
      return undefined;
    }
    throw error;
  }
}
