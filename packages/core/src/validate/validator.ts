/**
 * Validation harness: a Validator runs Rules against a context and collects
 * the Findings each rule reports.
 *
 * Every finding has a default severity (error unless the finding says
 * otherwise). A validator takes a map of finding ids to severities, so that
 * callers decide which findings block and which are informational. A finding
 * whose effective severity is `fatal` stops the run.
 */

import { ConfigError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { silentLogger, type Logger } from '../util/logger.js';

export const FINDING_SEVERITIES = ['info', 'warning', 'error', 'fatal'] as const;

export type FindingSeverity = (typeof FINDING_SEVERITIES)[number];

export function isFindingSeverity(value: unknown): value is FindingSeverity {
  return FINDING_SEVERITIES.some((severity) => severity === value);
}

export abstract class Finding {
  /** Key of this kind of finding in severity maps. */
  abstract readonly id: string;

  #severity?: FindingSeverity;

  abstract message(): string;

  protected defaultSeverity(): FindingSeverity {
    return 'error';
  }

  get severity(): FindingSeverity {
    return this.#severity ?? this.defaultSeverity();
  }

  set severity(severity: FindingSeverity) {
    this.#severity = severity;
  }

  toString(): string {
    return this.message();
  }
}

export interface RuleMetadata {
  name: string;
  description?: string;
}

export interface Rule<Context> {
  readonly metadata: RuleMetadata;
  validate(context: Context): Finding[];
}

/** Findings per rule, in rule order. Rules without findings map to []. */
export type ValidationFindings<Context> = Map<Rule<Context>, Finding[]>;

/** The finding that stopped a run, and the rule that reported it. */
export interface FatalFinding<Context> {
  rule: Rule<Context>;
  finding: Finding;
}

export type SeverityMap = Record<string, FindingSeverity>;

export interface ValidatorOptions {
  severities?: SeverityMap;
  logger?: Logger;
}

export abstract class Validator<Context> {
  readonly #severities: SeverityMap;
  readonly #logger: Logger;

  constructor(
    readonly context: Context,
    options: ValidatorOptions = {}
  ) {
    this.#severities = options.severities ?? {};
    this.#logger = options.logger ?? silentLogger;
  }

  abstract rules(): Array<Rule<Context>>;

  validate(): Result<ValidationFindings<Context>, FatalFinding<Context>> {
    const findings: ValidationFindings<Context> = new Map();
    this.#logger.debug('running validation');

    for (const rule of this.rules()) {
      const kept: Finding[] = [];
      findings.set(rule, kept);
      const reported = rule.validate(this.context);
      for (const finding of reported) {
        const override = this.#severities[finding.id];
        if (override !== undefined) finding.severity = override;
        if (finding.severity === 'fatal') {
          this.#logger.warn(`fatal finding: ${finding.message()}`);
          return err({ rule, finding });
        }
        kept.push(finding);
      }
      this.#logger.debug(`${reported.length} findings for rule ${rule.metadata.name}`);
    }

    return ok(findings);
  }
}

/**
 * Check a finding id → severity map read from configuration.
 *
 * @throws ConfigError naming the first entry with an unknown severity
 */
export function validateSeverities(severities: Record<string, unknown>): SeverityMap {
  const checked: SeverityMap = {};
  for (const [id, severity] of Object.entries(severities)) {
    if (!isFindingSeverity(severity)) {
      throw new ConfigError({
        message: `Invalid severity value: ${id} = ${String(severity)}`,
        context: { setting: `severity.${id}`, value: severity },
      });
    }
    checked[id] = severity;
  }
  return checked;
}
