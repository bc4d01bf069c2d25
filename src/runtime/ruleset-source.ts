import { existsSync, readFileSync, statSync } from "node:fs";
import path from "node:path";
import { config } from "../config";
import { logger as defaultLogger, type Logger } from "../logger";
import { formatLoadErrors, loadRuleSet } from "../rules/loader";
import type { LoadError, RuleSet, RuleSetFormat } from "../rules/types";

export type RuleSetInfo = {
  path: string;
  format: RuleSetFormat;
  hash: string;
  ruleCount: number;
  loadedAt: string;
};

export type RuleSetSnapshot = {
  ruleSet: RuleSet | null;
  info: RuleSetInfo;
  source: "loaded" | "fallback";
  // Errors from the most recent load attempt; empty when it succeeded.
  errors: LoadError[];
};

export type ReloadListener = (snapshot: RuleSetSnapshot) => void;

export type RuleSetSource = {
  getSnapshot: () => RuleSetSnapshot;
  reload: () => RuleSetSnapshot;
  // Notified after every load attempt made once the listener is registered.
  subscribe: (listener: ReloadListener) => () => void;
};

export type FileRuleSetSource = RuleSetSource & {
  watch: (intervalMs?: number) => () => void;
  // Removes the SIGHUP handler, stops every watch and drops listeners.
  close: () => void;
};

export type FileRuleSetSourceOptions = {
  path?: string;
  format?: RuleSetFormat;
  handleSignals?: boolean;
  logger?: Logger;
  now?: () => Date;
};

export type LintReport = {
  ok: boolean;
  path: string;
  errors: string[];
};

function resolveRulesRoot(): string {
  const roots = [
    process.cwd(),
    path.resolve(process.cwd(), ".."),
    path.resolve(process.cwd(), "..", ".."),
    path.resolve(process.cwd(), "..", "..", "..")
  ];

  for (const candidate of roots) {
    const rulesDir = path.resolve(candidate, "policies");
    if (existsSync(rulesDir)) {
      return rulesDir;
    }
  }

  return path.resolve(process.cwd(), "policies");
}

export function resolveRulesPath(explicit?: string): string {
  const configured = explicit ?? config.rules.path;
  return configured ? path.resolve(configured) : path.resolve(resolveRulesRoot(), "rules.v1.yaml");
}

export function detectFormat(filePath: string): RuleSetFormat {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".dsl" || ext === ".rules" ? "dsl" : "yaml";
}

function readRules(filePath: string, format: RuleSetFormat): { ruleSet: RuleSet } | { errors: LoadError[] } {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { errors: [{ kind: "parse", message: `failed to read ${filePath}: ${reason}` }] };
  }
  const result = loadRuleSet(raw, { format });
  return result.ok ? { ruleSet: result.value } : { errors: result.error };
}

export function lintRuleSetFile(filePath: string, format: RuleSetFormat = detectFormat(filePath)): LintReport {
  const outcome = readRules(filePath, format);
  if ("errors" in outcome) {
    return { ok: false, path: filePath, errors: formatLoadErrors(outcome.errors) };
  }
  return { ok: true, path: filePath, errors: [] };
}

/**
 * File-backed rule set that keeps serving the last good rule set when a
 * reload is rejected.
 */
export function createFileRuleSetSource(options?: FileRuleSetSourceOptions): FileRuleSetSource {
  const rulesPath = resolveRulesPath(options?.path);
  const format = options?.format ?? detectFormat(rulesPath);
  const logger = (options?.logger ?? defaultLogger).child({ rulesPath });
  const now = options?.now ?? (() => new Date());

  let lastGood: RuleSetSnapshot | null = null;
  let current: RuleSetSnapshot | null = null;
  const listeners = new Set<ReloadListener>();
  const timers = new Set<NodeJS.Timeout>();

  const notify = (snapshot: RuleSetSnapshot): void => {
    for (const listener of listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error({ error }, "Reload listener failed");
      }
    }
  };

  const load = (): RuleSetSnapshot => {
    const outcome = readRules(rulesPath, format);

    if ("ruleSet" in outcome) {
      const snapshot: RuleSetSnapshot = {
        ruleSet: outcome.ruleSet,
        info: {
          path: rulesPath,
          format,
          hash: outcome.ruleSet.hash,
          ruleCount: outcome.ruleSet.rules.length,
          loadedAt: now().toISOString()
        },
        source: "loaded",
        errors: []
      };
      lastGood = snapshot;
      current = snapshot;
      logger.info({ hash: snapshot.info.hash, ruleCount: snapshot.info.ruleCount }, "Rule set loaded");
      notify(snapshot);
      return snapshot;
    }

    const { errors } = outcome;
    logger.warn(
      { errors: formatLoadErrors(errors), keptHash: lastGood?.info.hash ?? null },
      "Rule set rejected"
    );

    const snapshot: RuleSetSnapshot = lastGood
      ? { ...lastGood, errors }
      : {
          ruleSet: null,
          info: { path: rulesPath, format, hash: "unavailable", ruleCount: 0, loadedAt: now().toISOString() },
          source: "fallback",
          errors
        };
    current = snapshot;
    notify(snapshot);
    return snapshot;
  };

  load();

  const onSighup = (): void => {
    logger.info("SIGHUP received; reloading rule set");
    load();
  };
  const handleSignals = options?.handleSignals ?? config.rules.reloadOnSighup;
  if (handleSignals) {
    process.on("SIGHUP", onSighup);
  }

  const watch = (intervalMs: number = config.rules.reloadIntervalMs): (() => void) => {
    const mtimeOf = (): number | null => {
      try {
        return statSync(rulesPath).mtimeMs;
      } catch (error) {
        logger.debug({ error }, "Rule file not readable while watching");
        return null;
      }
    };

    let lastMtime = mtimeOf();
    const timer = setInterval(() => {
      const mtime = mtimeOf();
      if (mtime !== null && mtime !== lastMtime) {
        lastMtime = mtime;
        load();
      }
    }, intervalMs);
    timer.unref();
    timers.add(timer);

    return () => {
      clearInterval(timer);
      timers.delete(timer);
    };
  };

  const close = (): void => {
    if (handleSignals) {
      process.off("SIGHUP", onSighup);
    }
    for (const timer of timers) {
      clearInterval(timer);
    }
    timers.clear();
    listeners.clear();
  };

  return {
    getSnapshot: () => current ?? load(),
    reload: () => load(),
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    watch,
    close
  };
}
