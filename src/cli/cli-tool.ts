import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { CliToolError, errorMessage, hasErrorCode } from "../errors";

const execFileAsync = promisify(execFile);

export interface CliTool {
  version(): Promise<string>;
}

export class ExecFileCliTool implements CliTool {
  constructor(private readonly binary: string) {}

  async version(): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.binary, ["-v"]);
      return stdout.trim();
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        throw new CliToolError(
          `${this.binary} command not found. Make sure it is installed and on PATH.`
        );
      }
      throw new CliToolError(`${this.binary} -v failed: ${errorMessage(error)}`);
    }
  }
}
