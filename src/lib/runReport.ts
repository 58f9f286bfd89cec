import type { PipelineWarning, SeasonFailure, WarningKind } from '../../types/index.js';

/** Raised for data that cannot be processed at all (e.g. a team with no managers). */
export class DataIntegrityError extends Error {
  constructor(
    message: string,
    readonly season?: number
  ) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

/** Raised for invalid environment or identity configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const INFO_KINDS: ReadonlySet<WarningKind> = new Set([
  'MissingPriorIncrementalState',
  'BracketTiebreak',
]);

/**
 * Collects warnings and per-season failures during a run. Nothing here
 * interrupts processing; `print()` reports everything once at the end.
 */
export class RunReport {
  readonly warnings: PipelineWarning[] = [];
  readonly failures: SeasonFailure[] = [];

  warn(kind: WarningKind, message: string, where: { season?: number; week?: number } = {}) {
    this.warnings.push({
      kind,
      level: INFO_KINDS.has(kind) ? 'info' : 'warn',
      ...where,
      message,
    });
  }

  fail(season: number, reason: string) {
    this.failures.push({ season, reason });
  }

  count(kind: WarningKind): number {
    return this.warnings.filter(w => w.kind === kind).length;
  }

  get hasFailures(): boolean {
    return this.failures.length > 0;
  }

  print(log: Pick<Console, 'log' | 'warn' | 'error'> = console) {
    const warnings = this.warnings.filter(w => w.level === 'warn');
    const notices = this.warnings.filter(w => w.level === 'info');
    if (!warnings.length && !notices.length && !this.failures.length) {
      log.log('Run finished with no warnings ✅');
      return;
    }
    for (const w of notices) log.log(`[${w.kind}]${where(w)} ${w.message}`);
    for (const w of warnings) log.warn(`[${w.kind}]${where(w)} ${w.message}`);
    for (const f of this.failures) log.error(`[SeasonFailure] ${f.season}: ${f.reason}`);
    log.log(
      `Run finished with ${warnings.length} warning(s), ${notices.length} notice(s), ${this.failures.length} failed season(s)`
    );
  }
}

function where(w: PipelineWarning): string {
  if (w.season === undefined) return '';
  return w.week === undefined ? ` ${w.season}` : ` ${w.season} wk${w.week}`;
}
