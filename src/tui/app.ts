import { resolve } from "node:path";
import blessed from "blessed";
import { messageOf } from "../errors.js";
import { formatSize } from "../format.js";
import type { AppController, AppSnapshot } from "../services/appController.js";
import type { BatchOperationKind } from "../services/batchProcessor.js";
import { formatBatchProgress } from "../services/batchProcessor.js";
import { serviceRequest } from "../services/operationKinds.js";
import { describeFilter } from "../services/packageFilter.js";
import type { CleanupPreviewState } from "../services/packageStore.js";
import { formatStatusEvent } from "../services/statusBus.js";
import type { ManagedService, Package, PackageRef, ServiceAction } from "../types.js";
import { refKey } from "../types.js";

interface AppOptions {
  debug?: boolean;
  tickIntervalMs?: number;
  confirmBeforeActions?: boolean;
}

type View = "installed" | "outdated" | "search" | "services";

const VIEWS: View[] = ["installed", "outdated", "search", "services"];

const HELP =
  "tab:view  space:select  r:reload  /:search  f:filter  1:formulae  2:casks  enter:info  i:install  x:uninstall  " +
  "u:update  U:update all  p:pin  c:clean cache  o:old versions  s:cache size  e:export  m:import  " +
  "g/t/R:start/stop/restart service  b:cancel batch  q:quit";

export class TapdeckApp {
  private readonly screen = blessed.screen({
    smartCSR: true,
    fullUnicode: true,
    title: "tapdeck"
  });

  private readonly list = blessed.list({
    parent: this.screen,
    top: 0,
    left: 0,
    width: "45%",
    height: "85%",
    border: "line",
    label: " Installed ",
    keys: false,
    vi: false,
    mouse: true,
    scrollbar: {
      ch: " "
    },
    style: {
      selected: {
        bg: "blue",
        fg: "white"
      }
    }
  });

  private readonly details = blessed.box({
    parent: this.screen,
    top: 0,
    left: "45%",
    width: "55%",
    height: "40%",
    border: "line",
    label: " Details ",
    tags: false,
    scrollable: true,
    alwaysScroll: true,
    keys: false,
    mouse: true,
    vi: true,
    content: "Select a package to view details."
  });

  private readonly logBox = blessed.box({
    parent: this.screen,
    top: "40%",
    left: "45%",
    width: "55%",
    height: "45%",
    border: "line",
    label: " Log ",
    tags: false,
    scrollable: true,
    alwaysScroll: true,
    keys: false,
    mouse: true,
    vi: true
  });

  private readonly footer = blessed.box({
    parent: this.screen,
    bottom: 0,
    left: 0,
    width: "100%",
    height: "15%",
    border: "line",
    tags: false,
    content: HELP
  });

  private readonly question = blessed.question({
    parent: this.screen,
    border: "line",
    height: 8,
    width: "70%",
    top: "center",
    left: "center",
    label: " Confirm ",
    tags: false,
    keys: true,
    vi: true
  });

  private readonly prompt = blessed.prompt({
    parent: this.screen,
    border: "line",
    height: 9,
    width: "70%",
    top: "center",
    left: "center",
    label: " Input ",
    tags: false,
    keys: true,
    vi: true
  });

  private readonly passwordForm = blessed.box({
    parent: this.screen,
    border: "line",
    height: 9,
    width: "70%",
    top: "center",
    left: "center",
    label: " Password ",
    tags: false,
    hidden: true
  });

  private readonly passwordBox = blessed.textbox({
    parent: this.passwordForm,
    bottom: 0,
    left: 1,
    right: 1,
    height: 1,
    censor: true,
    inputOnFocus: false,
    style: {
      bg: "black",
      fg: "white"
    }
  });

  private view: View = "installed";
  private rows: Package[] = [];
  private serviceRows: ManagedService[] = [];
  private readonly selected = new Set<string>();
  private modalOpen = false;
  private lastRevision = -1;
  private lastPreview?: CleanupPreviewState;
  private awaitingPreview?: CleanupPreviewState["scope"];
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly controller: AppController,
    private readonly options: AppOptions = {}
  ) {}

  start(): void {
    this.bindKeys();
    this.controller.reload();
    this.timer = setInterval(() => this.onTick(), this.options.tickIntervalMs ?? 100);
    this.render(this.controller.snapshot());
  }

  private bindKeys(): void {
    this.screen.key(["q", "C-c"], () => {
      if (this.timer) {
        clearInterval(this.timer);
      }
      this.screen.destroy();
      process.exit(0);
    });

    this.screen.key(["j", "down"], () => this.moveSelection(1));
    this.screen.key(["k", "up"], () => this.moveSelection(-1));

    this.guardedKey(["tab"], () => {
      this.view = VIEWS[(VIEWS.indexOf(this.view) + 1) % VIEWS.length];
      this.selected.clear();
      this.list.select(0);
      if (this.view === "services" && this.serviceRows.length === 0) {
        this.controller.requestOperation({ kind: "servicesList" });
      }
      this.refresh();
    });

    this.guardedKey(["space"], () => this.toggleSelected());
    this.guardedKey(["r"], () => {
      if (this.view === "services") {
        this.controller.requestOperation({ kind: "servicesList" });
      } else {
        this.controller.reload();
      }
    });
    this.guardedKey(["f"], () => void this.askFilter());
    this.guardedKey(["1"], () => {
      const { showFormulae } = this.controller.snapshot().filter;
      this.controller.setFilter({ showFormulae: !showFormulae });
      this.refresh();
    });
    this.guardedKey(["2"], () => {
      const { showCasks } = this.controller.snapshot().filter;
      this.controller.setFilter({ showCasks: !showCasks });
      this.refresh();
    });
    this.guardedKey(["g"], () => this.runOnService("start"));
    this.guardedKey(["t"], () => this.runOnService("stop"));
    this.guardedKey(["S-r"], () => this.runOnService("restart"));
    this.guardedKey(["enter"], () => this.loadInfo());
    this.guardedKey(["/"], () => void this.askSearch());
    this.guardedKey(["i"], () => void this.runOnTargets("install"));
    this.guardedKey(["x"], () => void this.runOnTargets("uninstall"));
    this.guardedKey(["u"], () => void this.runOnTargets("update"));
    this.guardedKey(["p"], () => void this.togglePin());
    this.guardedKey(["S-u"], () => void this.updateAll());
    this.guardedKey(["c"], () => this.previewCleanup("cache"));
    this.guardedKey(["o"], () => this.previewCleanup("oldVersions"));
    this.guardedKey(["s"], () => this.controller.requestOperation({ kind: "cacheSize" }));
    this.guardedKey(["e"], () => void this.exportBrewfile());
    this.guardedKey(["m"], () => void this.importBrewfile());
    this.guardedKey(["b"], () => {
      if (!this.controller.cancelBatch()) {
        this.controller.bus.publish("No batch to cancel");
      }
    });

    this.list.on("select", () => {
      this.renderDetails();
      this.screen.render();
    });
  }

  private guardedKey(keys: string[], handler: () => void): void {
    this.screen.key(keys, () => {
      if (this.modalOpen) {
        return;
      }
      try {
        handler();
      } catch (error) {
        this.onError(error);
      }
    });
  }

  private onTick(): void {
    try {
      this.controller.tick();
      const snapshot = this.controller.snapshot();
      if (snapshot.revision !== this.lastRevision) {
        this.render(snapshot);
      }
      this.offerPendingCleanup(snapshot);
      if (snapshot.prompt && !this.modalOpen) {
        void this.askPassword(snapshot.prompt.id, snapshot.prompt.title, snapshot.prompt.message);
      }
    } catch (error) {
      this.onError(error);
    }
  }

  private refresh(): void {
    this.render(this.controller.snapshot());
  }

  private render(snapshot: AppSnapshot): void {
    this.lastRevision = snapshot.revision;
    this.rows = this.view === "services" ? [] : [...rowsFor(this.view, snapshot)];
    this.serviceRows = [...snapshot.services];
    const filtered = this.view === "installed" || this.view === "outdated" ? describeFilter(snapshot.filter) : "";
    const count = this.rowCount();
    this.list.setLabel(` ${viewLabel(this.view)} (${count})${filtered ? ` ${filtered}` : ""} `);

    if (count === 0) {
      this.list.setItems([this.view === "search" ? "(press / to search)" : "(empty)"]);
    } else {
      const index = this.selectedIndex();
      const items =
        this.view === "services" ? this.serviceRows.map(formatServiceRow) : this.rows.map((pkg) => this.formatRow(pkg));
      this.list.setItems(items);
      this.list.select(clampIndex(index, count));
    }

    this.renderDetails();
    this.logBox.setContent(snapshot.log.map(formatStatusEvent).join("\n"));
    this.logBox.setScrollPerc(100);
    this.setStatus(snapshot);
    this.screen.render();
  }

  private formatRow(pkg: Package): string {
    const mark = this.selected.has(refKey(pkg)) ? "[*]" : "[ ]";
    const version = pkg.versionLoadFailed ? "?" : (pkg.version ?? "");
    const newer = pkg.availableVersion && pkg.outdated ? ` -> ${pkg.availableVersion}` : "";
    const flags = `${pkg.pinned ? " (pinned)" : ""}${pkg.installed && this.view === "search" ? " (installed)" : ""}`;
    return `${mark} ${pkg.name} [${pkg.kind}] ${version}${newer}${flags}`;
  }

  private renderDetails(): void {
    if (this.view === "services") {
      this.renderServiceDetails();
      return;
    }
    const current = this.currentPackage();
    if (!current) {
      this.details.setContent("No selection.");
      return;
    }

    const info = this.controller.store.infoFor(current);
    const pkg: Package = info ? { ...current, ...info, installed: current.installed || info.installed } : current;
    const lines = [
      `Name: ${pkg.name}`,
      `Kind: ${pkg.kind}`,
      `Installed: ${pkg.installed ? "yes" : "no"}`,
      `Version: ${pkg.version ?? "unknown"}`
    ];
    if (pkg.availableVersion) {
      lines.push(`Available: ${pkg.availableVersion}`);
    }
    lines.push(`Pinned: ${pkg.pinned ? "yes" : "no"}`);
    if (pkg.description) {
      lines.push("", pkg.description);
    }
    if (pkg.versionLoadFailed) {
      lines.push("", "Package info could not be loaded.");
    } else if (!info) {
      lines.push("", "Press enter to load package info.");
    }
    this.details.setContent(lines.join("\n"));
  }

  private renderServiceDetails(): void {
    const service = this.currentService();
    if (!service) {
      this.details.setContent("No services loaded. Press r to load brew services.");
      return;
    }
    const lines = [`Service: ${service.name}`, `Status: ${service.status}`];
    if (service.user) {
      lines.push(`User: ${service.user}`);
    }
    if (service.file) {
      lines.push(`File: ${service.file}`);
    }
    this.details.setContent(lines.join("\n"));
  }

  private setStatus(snapshot: AppSnapshot): void {
    const debugHint = this.options.debug ? "  [debug]" : "";
    const cancelling = snapshot.batch?.cancelled ? " (cancelling)" : "";
    const batch = snapshot.batch ? `  ${formatBatchProgress(snapshot.batch)}${cancelling}` : "";
    const privileged = snapshot.tasks.find((task) => task.privileged && task.phase === "running");
    const running = privileged ? `, ${privileged.description}` : "";
    const tasks = snapshot.tasks.length > 0 ? `  [${snapshot.tasks.length} tasks${running}]` : "";
    const cache = snapshot.cacheInfo ? `  cache: ${formatSize(snapshot.cacheInfo.totalSize)}` : "";
    this.footer.setContent(`${HELP}\n${snapshot.status}${batch}${tasks}${cache}${debugHint}`);
  }

  private onError(error: unknown): void {
    this.controller.bus.publish(`Error: ${messageOf(error)}`, "error");
    this.refresh();
  }

  private moveSelection(delta: number): void {
    const count = this.rowCount();
    if (count === 0 || this.modalOpen) {
      return;
    }

    const next = clampIndex(this.selectedIndex() + delta, count);
    this.list.select(next);
    this.renderDetails();
    this.screen.render();
  }

  private toggleSelected(): void {
    const current = this.currentPackage();
    if (!current) {
      return;
    }
    const key = refKey(current);
    if (this.selected.has(key)) {
      this.selected.delete(key);
    } else {
      this.selected.add(key);
    }
    this.moveSelection(1);
    this.refresh();
  }

  private loadInfo(): void {
    const current = this.currentPackage();
    if (current) {
      this.controller.requestOperation({ kind: "getInfo", target: toRef(current) });
    }
  }

  /** Selected rows of the current view, or the highlighted row when nothing is selected. */
  private targets(): PackageRef[] {
    const chosen = this.rows.filter((pkg) => this.selected.has(refKey(pkg))).map(toRef);
    if (chosen.length > 0) {
      return chosen;
    }
    const current = this.currentPackage();
    return current ? [toRef(current)] : [];
  }

  private async runOnTargets(kind: BatchOperationKind): Promise<void> {
    const targets = this.targets();
    if (targets.length === 0) {
      this.controller.bus.publish("Nothing selected");
      return;
    }

    const names = targets.map((ref) => ref.name).join(", ");
    if (!(await this.confirmAction(`${capitalize(kind)} ${targets.length} package(s)?\n${names}`))) {
      this.controller.bus.publish(`${capitalize(kind)} cancelled.`);
      return;
    }

    this.controller.requestOperation({ kind, targets });
    this.selected.clear();
    this.refresh();
  }

  private runOnService(action: ServiceAction): void {
    const service = this.currentService();
    if (!service) {
      const hint = this.view === "services" ? "No service selected" : "Switch to the services view first";
      this.controller.bus.publish(hint);
      return;
    }
    this.controller.requestOperation(serviceRequest(action, service.name));
  }

  private async askFilter(): Promise<void> {
    const { query } = this.controller.snapshot().filter;
    const input = await this.promptInput("Filter installed packages (empty clears)", query);
    if (input === null) {
      return;
    }
    this.controller.setFilter({ query: input.trim() });
    this.list.select(0);
    this.refresh();
  }

  private async togglePin(): Promise<void> {
    const current = this.currentPackage();
    if (!current) {
      return;
    }
    await this.runOnTargets(current.pinned ? "unpin" : "pin");
  }

  private async updateAll(): Promise<void> {
    if (!(await this.confirmAction("Run brew update and upgrade all packages?"))) {
      this.controller.bus.publish("Update all cancelled.");
      return;
    }
    this.controller.requestOperation({ kind: "updateAll" });
  }

  private previewCleanup(scope: CleanupPreviewState["scope"]): void {
    this.awaitingPreview = scope;
    this.controller.requestOperation({ kind: "cleanupPreview", scope });
  }

  private offerPendingCleanup(snapshot: AppSnapshot): void {
    const preview = snapshot.cleanupPreview;
    if (!this.awaitingPreview || !preview || preview === this.lastPreview || this.modalOpen) {
      return;
    }
    this.lastPreview = preview;
    if (preview.scope !== this.awaitingPreview) {
      return;
    }
    this.awaitingPreview = undefined;
    void this.confirmCleanup(preview);
  }

  private async confirmCleanup(state: CleanupPreviewState): Promise<void> {
    const { preview, scope } = state;
    if (preview.items.length === 0) {
      this.controller.bus.publish("Nothing to clean up");
      return;
    }

    const what = scope === "cache" ? "Clean the download cache" : "Remove old versions";
    const confirmed = await this.confirmAction(
      `${what}? ${preview.items.length} item(s), about ${formatSize(preview.totalSize)}`
    );
    if (!confirmed) {
      this.controller.bus.publish("Cleanup cancelled.");
      return;
    }
    this.controller.requestOperation({ kind: scope === "cache" ? "cleanCache" : "cleanupOldVersions" });
  }

  private async askSearch(): Promise<void> {
    const input = await this.promptInput("Search packages", "");
    const query = input?.trim();
    if (!query) {
      this.controller.bus.publish("Search cancelled.");
      return;
    }

    this.view = "search";
    this.selected.clear();
    this.list.select(0);
    this.controller.requestOperation({ kind: "search", query });
    this.refresh();
  }

  private async exportBrewfile(): Promise<void> {
    const input = await this.promptInput("Export Brewfile to", "Brewfile");
    const path = input?.trim();
    if (!path) {
      this.controller.bus.publish("Export cancelled.");
      return;
    }
    this.controller.requestOperation({ kind: "exportBrewfile", path: resolve(process.cwd(), path) });
  }

  private async importBrewfile(): Promise<void> {
    const input = await this.promptInput("Install packages from Brewfile", "Brewfile");
    const path = input?.trim();
    if (!path) {
      this.controller.bus.publish("Import cancelled.");
      return;
    }
    this.controller.requestOperation({ kind: "readBrewfile", path: resolve(process.cwd(), path) });
  }

  private currentPackage(): Package | undefined {
    if (this.rows.length === 0) {
      return undefined;
    }
    return this.rows[clampIndex(this.selectedIndex(), this.rows.length)];
  }

  private currentService(): ManagedService | undefined {
    if (this.view !== "services" || this.serviceRows.length === 0) {
      return undefined;
    }
    return this.serviceRows[clampIndex(this.selectedIndex(), this.serviceRows.length)];
  }

  private rowCount(): number {
    return this.view === "services" ? this.serviceRows.length : this.rows.length;
  }

  private selectedIndex(): number {
    const list = this.list as unknown as { selected?: number };
    return list.selected ?? 0;
  }

  private async confirmAction(message: string): Promise<boolean> {
    if (this.options.confirmBeforeActions === false) {
      return true;
    }
    return this.confirm(message);
  }

  private confirm(message: string): Promise<boolean> {
    this.modalOpen = true;
    return new Promise((resolve) => {
      (this.question as unknown as { ask: (msg: string, cb: (...args: unknown[]) => void) => void }).ask(
        message,
        (...args: unknown[]) => {
          const answer = args[args.length - 1];
          this.modalOpen = false;
          resolve(Boolean(answer));
        }
      );
    });
  }

  private promptInput(label: string, initialValue: string): Promise<string | null> {
    this.modalOpen = true;
    return new Promise((resolve) => {
      (
        this.prompt as unknown as {
          input: (msg: string, value: string, cb: (err: unknown, result: string | null) => void) => void;
        }
      ).input(`${label}:`, initialValue, (_err: unknown, value: string | null) => {
        this.modalOpen = false;
        resolve(value);
      });
    });
  }

  private async askPassword(promptId: string, title: string, message: string): Promise<void> {
    const secret = await this.readPassword(title, message);
    if (secret === null) {
      this.controller.cancelPrompt(promptId);
    } else {
      this.controller.supplyCredential(promptId, secret);
    }
    this.refresh();
  }

  private readPassword(title: string, message: string): Promise<string | null> {
    this.modalOpen = true;
    this.passwordForm.setLabel(` ${title} `);
    this.passwordForm.setContent(`${message}\nEnter submits, Escape cancels.`);
    this.passwordForm.show();
    this.passwordForm.setFront();
    this.passwordBox.focus();
    this.screen.render();

    return new Promise((resolve) => {
      (
        this.passwordBox as unknown as {
          readInput: (cb: (err: unknown, value?: string | null) => void) => void;
        }
      ).readInput((_err: unknown, value?: string | null) => {
        this.passwordBox.clearValue();
        this.passwordForm.hide();
        this.list.focus();
        this.modalOpen = false;
        resolve(typeof value === "string" ? value : null);
      });
    });
  }
}

function rowsFor(view: Exclude<View, "services">, snapshot: AppSnapshot): readonly Package[] {
  switch (view) {
    case "installed":
      return snapshot.packages;
    case "outdated":
      return snapshot.outdated;
    case "search":
      return snapshot.searchResults;
  }
}

function formatServiceRow(service: ManagedService): string {
  return `${service.name} [${service.status}]${service.user ? ` ${service.user}` : ""}`;
}

function viewLabel(view: View): string {
  switch (view) {
    case "installed":
      return "Installed";
    case "outdated":
      return "Outdated";
    case "search":
      return "Search";
    case "services":
      return "Services";
  }
}

function toRef(pkg: PackageRef): PackageRef {
  return { name: pkg.name, kind: pkg.kind };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function clampIndex(index: number, length: number): number {
  if (length <= 0) {
    return 0;
  }
  return Math.max(0, Math.min(length - 1, index));
}
