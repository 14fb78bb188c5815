import { describe, expect, it } from "vitest";
import { classifyFailure } from "../src/services/failureClassifier.js";
import type { CommandResult } from "../src/types.js";

function result(stderr: string, overrides: Partial<CommandResult> = {}): CommandResult {
  return { code: 1, stdout: "", stderr, timedOut: false, ...overrides };
}

const context = { command: "brew install", credentialSupplied: false };

describe("classifyFailure", () => {
  it("reports timeouts before looking at output", () => {
    expect(classifyFailure(result("Password:", { code: 124, timedOut: true }), context)).toEqual({
      code: "timeout",
      message: "brew install timed out"
    });
  });

  it("asks for a password when none was supplied", () => {
    expect(classifyFailure(result("sudo: a password is required"), context)).toEqual({
      code: "authRequired",
      message: "brew install requires an administrator password"
    });
  });

  it("treats an auth failure after a supplied password as rejected", () => {
    expect(
      classifyFailure(result("Sorry, try again.\nsudo: 1 incorrect password attempt"), {
        ...context,
        credentialSupplied: true
      })
    ).toEqual({ code: "authRejected", message: "Incorrect password" });
  });

  it("does not mistake an app named after a password manager for an auth failure", () => {
    const output = result("Error: It seems there is already an App at '/Applications/1Password.app'.");

    expect(classifyFailure(output, context)).toEqual({
      code: "externalToolError",
      message: "It seems there is already an App at '/Applications/1Password.app'."
    });
    expect(classifyFailure(output, { ...context, credentialSupplied: true }).code).toBe("externalToolError");
  });

  it("matches auth phrases case-sensitively", () => {
    expect(classifyFailure(result("Error: Sudo mode plugin crashed"), context).code).toBe("externalToolError");
  });

  it("recognizes missing packages", () => {
    expect(classifyFailure(result("Error: No available formula with the name \"wgett\"."), context)).toEqual({
      code: "notFound",
      message: "No available formula with the name \"wgett\"."
    });
  });

  it("falls back to the exit code when there is no output", () => {
    expect(classifyFailure(result("", { code: 2 }), { command: "brew upgrade", credentialSupplied: false })).toEqual(
      { code: "externalToolError", message: "brew upgrade failed with exit code 2" }
    );
  });
});
