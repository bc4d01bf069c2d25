export type TelemetrySnapshot = {
  decisions: number;
  matches: number;
  noMatches: number;
  reloads: number;
  reloadFailures: number;
  errors: number;
  lastError: string | null;
};

export class DecisionTelemetry {
  private decisions = 0;
  private matches = 0;
  private reloads = 0;
  private reloadFailures = 0;
  private errors = 0;
  private lastError: string | null = null;

  recordDecision(matched: boolean): void {
    this.decisions += 1;
    if (matched) {
      this.matches += 1;
    }
  }

  recordReload(ok: boolean): void {
    this.reloads += 1;
    if (!ok) {
      this.reloadFailures += 1;
    }
  }

  recordError(message: string): void {
    this.errors += 1;
    this.lastError = message;
  }

  snapshot(): TelemetrySnapshot {
    return {
      decisions: this.decisions,
      matches: this.matches,
      noMatches: this.decisions - this.matches,
      reloads: this.reloads,
      reloadFailures: this.reloadFailures,
      errors: this.errors,
      lastError: this.lastError
    };
  }
}
