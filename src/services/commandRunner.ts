import { spawn } from "node:child_process";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { CommandExecutor, CommandResult, RunOptions } from "../types.js";

const TIMEOUT_EXIT_CODE = 124;

export class ShellCommandRunner implements CommandExecutor {
  constructor(private readonly logger: Logger = silentLogger) {}

  async run(cmd: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const { timeoutMs, env, signal } = options;
    this.logger.debug(`Running: ${cmd} ${args.join(" ")}`);

    return new Promise((resolve, reject) => {
      const child = spawn(cmd, args, {
        stdio: ["ignore", "pipe", "pipe"],
        env: env ? { ...process.env, ...env } : process.env
      });
      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      const terminate = (): void => {
        if (timedOut) {
          return;
        }
        timedOut = true;
        child.kill("SIGTERM");
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(terminate, timeoutMs);
      }

      if (signal) {
        if (signal.aborted) {
          terminate();
        } else {
          signal.addEventListener("abort", terminate, { once: true });
        }
      }

      const cleanup = (): void => {
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener("abort", terminate);
      };

      child.stdout.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });

      child.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on("error", (error) => {
        cleanup();
        reject(error);
      });

      child.on("close", (code) => {
        cleanup();
        if (timedOut) {
          this.logger.warn(`Terminated after deadline: ${cmd} ${args.join(" ")}`);
        }
        resolve({
          code: timedOut ? TIMEOUT_EXIT_CODE : code ?? 1,
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          timedOut
        });
      });
    });
  }
}
