import { fileURLToPath } from "node:url";

export const ASKPASS_SECRET_ENV = "TAPDECK_ASKPASS_SECRET";

export function defaultAskpassPath(): string {
  return fileURLToPath(new URL("../../bin/askpass.sh", import.meta.url));
}

/**
 * Environment for one attempt that needs the administrator password. sudo runs
 * the helper, which prints the secret from the child's own environment.
 */
export function askpassEnv(credential: string, helperPath: string): Record<string, string> {
  return {
    SUDO_ASKPASS: helperPath,
    [ASKPASS_SECRET_ENV]: credential
  };
}
