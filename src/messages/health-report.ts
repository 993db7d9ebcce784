// src/messages/health-report.ts

import { HEALTH_REPORT_VERSION } from '../constants/constants.js';
import { MessageEncodeError } from '../errors.js';

export type RiskLevel = 'green' | 'yellow' | 'red';

/**
 * Result of a health-risk classification, relayed as-is over the mesh.
 */
export interface HealthReport {
  version: number;
  /** Who the report is about */
  person: string;
  /** Unix time in seconds */
  timestamp: number;
  risk: RiskLevel;
  recommendation: string;
  /** Set when the receiving side should raise an alarm */
  alert: boolean;
}

export interface HealthReportInput {
  person: string;
  risk: RiskLevel;
  recommendation: string;
  /** Defaults to `risk === 'red'` */
  alert?: boolean;
  /** Seconds, or a Date. Defaults to now. */
  timestamp?: number | Date;
}

const RISK_CODES: Record<RiskLevel, number> = {
  green: 1,
  yellow: 2,
  red: 3,
};

export function riskToCode(risk: RiskLevel): number {
  return RISK_CODES[risk];
}

export function riskFromCode(code: number): RiskLevel | null {
  switch (code) {
    case 1:
      return 'green';
    case 2:
      return 'yellow';
    case 3:
      return 'red';
    default:
      return null;
  }
}

export function isRiskLevel(value: unknown): value is RiskLevel {
  return value === 'green' || value === 'yellow' || value === 'red';
}

/**
 * @throws MessageEncodeError when a field is out of range
 */
export function createHealthReport(input: HealthReportInput): HealthReport {
  const timestamp =
    input.timestamp instanceof Date
      ? Math.floor(input.timestamp.getTime() / 1000)
      : (input.timestamp ?? Math.floor(Date.now() / 1000));

  const report: HealthReport = {
    version: HEALTH_REPORT_VERSION,
    person: input.person,
    timestamp,
    risk: input.risk,
    recommendation: input.recommendation,
    alert: input.alert ?? input.risk === 'red',
  };
  validateHealthReport(report);
  return report;
}

/**
 * @throws MessageEncodeError
 */
export function validateHealthReport(report: HealthReport): void {
  if (!Number.isInteger(report.version) || report.version < 1 || report.version > 0xffffffff) {
    throw new MessageEncodeError(`Invalid health report version: ${report.version}`);
  }
  if (report.person.trim() === '') {
    throw new MessageEncodeError('Health report person must not be empty');
  }
  if (!Number.isInteger(report.timestamp) || report.timestamp < 0 || report.timestamp > 0xffffffff) {
    throw new MessageEncodeError(`Invalid health report timestamp: ${report.timestamp}`);
  }
  if (!isRiskLevel(report.risk)) {
    throw new MessageEncodeError(`Invalid risk level: ${String(report.risk)}`);
  }
}
