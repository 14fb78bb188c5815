import { readFile } from "node:fs/promises";
import { BrewCommandError, UnsupportedOperationError, messageOf } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { parseBrewfile } from "../parser/brewfileParser.js";
import {
  parseCleanupPreview,
  parseDiskUsage,
  parseInfoJson,
  parseInstalledJson,
  parseOutdatedJson,
  parsePinnedList,
  parseSearchOutput,
  parseServicesList
} from "../parser/brewOutputParser.js";
import type {
  CacheInfo,
  CleanupPreview,
  CleanupScope,
  CommandExecutor,
  ExecuteOptions,
  ManagedService,
  OperationGateway,
  OperationOutcome,
  OperationRequest,
  Package,
  PackageKind,
  PackageRef,
  ParsedBrewfile
} from "../types.js";
import { failure, success } from "../types.js";
import { askpassEnv, defaultAskpassPath } from "./askpass.js";
import { classifyFailure } from "./failureClassifier.js";

export interface BrewServiceOptions {
  brewPath?: string;
  askpassPath?: string;
  logger?: Logger;
}

export class BrewService implements OperationGateway {
  private readonly brewPath: string;
  private readonly askpassPath: string;
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandExecutor,
    options: BrewServiceOptions = {}
  ) {
    this.brewPath = options.brewPath ?? "brew";
    this.askpassPath = options.askpassPath ?? defaultAskpassPath();
    this.logger = options.logger ?? silentLogger;
  }

  async execute(request: OperationRequest, options: ExecuteOptions = {}): Promise<OperationOutcome> {
    try {
      return await this.dispatch(request, options);
    } catch (error) {
      if (error instanceof BrewCommandError) {
        return { ok: false, reason: error.reason };
      }
      if (error instanceof UnsupportedOperationError) {
        return failure("externalToolError", error.message);
      }
      this.logger.error(`Unexpected failure running ${request.kind}`, { error: messageOf(error) });
      return failure("externalToolError", messageOf(error));
    }
  }

  private async dispatch(request: OperationRequest, options: ExecuteOptions): Promise<OperationOutcome> {
    switch (request.kind) {
      case "list":
        return success({ type: "packages", packages: await this.listInstalled(options) });
      case "listOutdated":
        return success({ type: "packages", packages: await this.listOutdated(options) });
      case "search":
        return success({
          type: "packages",
          packages: await this.search(request.query, request.packageKind, options)
        });
      case "getInfo":
        return success({ type: "package", package: await this.getInfo(request.target, options) });
      case "install":
        return success({ type: "message", message: await this.install(request.target, options) });
      case "uninstall":
        return success({ type: "message", message: await this.uninstall(request.target, options) });
      case "update":
        return success({ type: "message", message: await this.update(request.target, options) });
      case "updateAll":
        return success({ type: "message", message: await this.updateAndUpgradeAll(options) });
      case "cleanCache":
        return success({ type: "message", message: await this.cleanCache(options) });
      case "cleanupOldVersions":
        return success({ type: "message", message: await this.cleanupOldVersions(options) });
      case "pin":
        return success({ type: "message", message: await this.pin(request.target, options) });
      case "unpin":
        return success({ type: "message", message: await this.unpin(request.target, options) });
      case "cleanupPreview":
        return success({
          type: "cleanupPreview",
          preview: await this.cleanupPreview(request.scope, options)
        });
      case "cacheSize":
        return success({ type: "cacheSize", cache: await this.cacheSize(options) });
      case "exportBrewfile":
        return success({ type: "message", message: await this.dumpBrewfile(request.path, options) });
      case "readBrewfile":
        return success({ type: "brewfile", path: request.path, parsed: await this.readBrewfile(request.path) });
      case "servicesList":
        return success({ type: "services", services: await this.listServices(options) });
      case "serviceStart":
        return success({ type: "message", message: await this.startService(request.service, options) });
      case "serviceStop":
        return success({ type: "message", message: await this.stopService(request.service, options) });
      case "serviceRestart":
        return success({ type: "message", message: await this.restartService(request.service, options) });
      default:
        return assertNever(request);
    }
  }

  async listInstalled(options: ExecuteOptions = {}): Promise<Package[]> {
    const output = await this.brew(["info", "--json=v2", "--installed"], options);
    const pinned = await this.brew(["list", "--pinned"], options);
    return parseInstalledJson(output, parsePinnedList(pinned));
  }

  async listOutdated(options: ExecuteOptions = {}): Promise<Package[]> {
    const output = await this.brew(["outdated", "--json=v2"], options);
    return parseOutdatedJson(output);
  }

  async search(query: string, kind: PackageKind | undefined, options: ExecuteOptions = {}): Promise<Package[]> {
    const kinds: PackageKind[] = kind ? [kind] : ["formula", "cask"];
    const results: Package[] = [];

    for (const candidate of kinds) {
      try {
        const output = await this.brew(["search", kindFlag(candidate), query], options);
        results.push(...parseSearchOutput(output, candidate));
      } catch (error) {
        // brew exits non-zero when a kind has no matches
        if (!(error instanceof BrewCommandError) || error.reason.code !== "notFound") {
          throw error;
        }
      }
    }

    return results;
  }

  async getInfo(ref: PackageRef, options: ExecuteOptions = {}): Promise<Package> {
    const output = await this.brew(["info", "--json=v2", kindFlag(ref.kind), ref.name], options);
    return parseInfoJson(output, ref.name, ref.kind);
  }

  async install(ref: PackageRef, options: ExecuteOptions = {}): Promise<string> {
    const output = await this.brew(["install", kindFlag(ref.kind), ref.name], options);
    this.logOutput(output);
    return `${ref.name} installed successfully`;
  }

  async uninstall(ref: PackageRef, options: ExecuteOptions = {}): Promise<string> {
    const output = await this.brew(["uninstall", kindFlag(ref.kind), ref.name], options);
    this.logOutput(output);
    return `${ref.name} uninstalled successfully`;
  }

  async update(ref: PackageRef, options: ExecuteOptions = {}): Promise<string> {
    const output = await this.brew(["upgrade", kindFlag(ref.kind), ref.name], options);
    this.logOutput(output);
    return `${ref.name} updated successfully`;
  }

  async updateAndUpgradeAll(options: ExecuteOptions = {}): Promise<string> {
    const updated = await this.brew(["update"], options);
    const upgraded = await this.brew(["upgrade"], options);
    return [updated, upgraded].filter(Boolean).join("\n") || "All packages are up to date";
  }

  async cleanCache(options: ExecuteOptions = {}): Promise<string> {
    const output = await this.brew(["cleanup", "-s"], options);
    this.logOutput(output);
    return "Cache cleaned";
  }

  async cleanupOldVersions(options: ExecuteOptions = {}): Promise<string> {
    const output = await this.brew(["cleanup", "--prune=all"], options);
    this.logOutput(output);
    return "Old versions removed";
  }

  async cleanupPreview(scope: CleanupScope, options: ExecuteOptions = {}): Promise<CleanupPreview> {
    const args = scope === "cache" ? ["cleanup", "-s", "--dry-run"] : ["cleanup", "--prune=all", "--dry-run"];
    return parseCleanupPreview(await this.brew(args, options));
  }

  async cacheSize(options: ExecuteOptions = {}): Promise<CacheInfo> {
    const path = (await this.brew(["--cache"], options)).split(/\r?\n/)[0]?.trim() ?? "";
    if (!path) {
      throw new BrewCommandError({ code: "externalToolError", message: "brew --cache returned no path" });
    }
    const usage = await this.exec("du", ["-sk", path], options, "du");
    return parseDiskUsage(usage, path);
  }

  async pin(ref: PackageRef, options: ExecuteOptions = {}): Promise<string> {
    requireFormula(ref, "Pinning");
    await this.brew(["pin", ref.name], options);
    return `${ref.name} pinned successfully`;
  }

  async unpin(ref: PackageRef, options: ExecuteOptions = {}): Promise<string> {
    requireFormula(ref, "Unpinning");
    await this.brew(["unpin", ref.name], options);
    return `${ref.name} unpinned successfully`;
  }

  async dumpBrewfile(path: string, options: ExecuteOptions = {}): Promise<string> {
    const output = await this.brew(["bundle", "dump", "--force", "--file", path], options);
    this.logOutput(output);
    return `Brewfile written to ${path}`;
  }

  async readBrewfile(path: string): Promise<ParsedBrewfile> {
    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch (error) {
      throw new BrewCommandError({
        code: "notFound",
        message: `Brewfile not found at ${path}: ${messageOf(error)}`
      });
    }

    return parseBrewfile(content);
  }

  async listServices(options: ExecuteOptions = {}): Promise<ManagedService[]> {
    return parseServicesList(await this.brew(["services", "list"], options));
  }

  async startService(name: string, options: ExecuteOptions = {}): Promise<string> {
    this.logOutput(await this.brew(["services", "start", name], options));
    return `Started service ${name}`;
  }

  async stopService(name: string, options: ExecuteOptions = {}): Promise<string> {
    this.logOutput(await this.brew(["services", "stop", name], options));
    return `Stopped service ${name}`;
  }

  async restartService(name: string, options: ExecuteOptions = {}): Promise<string> {
    this.logOutput(await this.brew(["services", "restart", name], options));
    return `Restarted service ${name}`;
  }

  private brew(args: string[], options: ExecuteOptions): Promise<string> {
    return this.exec(this.brewPath, args, options, `brew ${args[0] ?? ""}`.trim());
  }

  private async exec(cmd: string, args: string[], options: ExecuteOptions, label: string): Promise<string> {
    const { credential, signal, timeoutMs } = options;
    const env = credential !== undefined ? askpassEnv(credential, this.askpassPath) : undefined;
    const result = await this.runner.run(cmd, args, { timeoutMs, signal, env });

    if (result.code !== 0 || result.timedOut) {
      const reason = classifyFailure(result, { command: label, credentialSupplied: credential !== undefined });
      this.logger.warn(`${label} failed (${reason.code})`, { exitCode: result.code });
      throw new BrewCommandError(reason);
    }

    return result.stdout;
  }

  private logOutput(output: string): void {
    if (output) {
      this.logger.info(`brew output: ${output}`);
    }
  }
}

function kindFlag(kind: PackageKind): string {
  return kind === "cask" ? "--cask" : "--formula";
}

function requireFormula(ref: PackageRef, action: string): void {
  if (ref.kind !== "formula") {
    throw new UnsupportedOperationError(`${action} is only supported for formulae`);
  }
}

function assertNever(value: never): never {
  throw new UnsupportedOperationError(`Unhandled operation: ${JSON.stringify(value)}`);
}
