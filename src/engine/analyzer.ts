/**
 * tapdeck — Heuristic Analyzer
 *
 * トランザクションにルール群を適用し、Finding を生成する。
 * ルールは個別に実行され、不正な入力で失敗したルールは skipped として
 * 報告される（analyze 自体は例外を投げない）。
 */

import type { Finding, FindingCategory, Severity, Transaction } from '../types/entities.js';
import type { QueryCriteria } from '../types/query.js';
import type { QueryEngine } from './query.js';
import type { TransactionRepository } from '../db/repository/transaction-repository.js';
import type { FindingRepository } from '../db/repository/finding-repository.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_ANALYZER_OPTIONS, type AnalyzerOptions, type Rule } from './rules/types.js';
import { SECURITY_RULES } from './rules/security.js';
import { PERFORMANCE_RULES } from './rules/performance.js';
import { BEST_PRACTICE_RULES } from './rules/best-practice.js';

export const DEFAULT_RULES: readonly Rule[] = [
  ...SECURITY_RULES,
  ...PERFORMANCE_RULES,
  ...BEST_PRACTICE_RULES,
];

export const SEVERITY_WEIGHTS: Record<Severity, number> = { info: 1, warning: 3, high: 10 };

const TOP_OFFENDERS = 10;

// ============================================================
// 結果型
// ============================================================

export interface SkippedRule {
  rule: string;
  reason: string;
}

export interface DetailedAnalysis {
  findings: Finding[];
  skipped: SkippedRule[];
}

export interface Offender {
  transactionId: number;
  method: string;
  url: string;
  score: number;
  findings: number;
}

export interface SessionAnalysis {
  analyzed: number;
  totalFindings: number;
  byCategory: Record<FindingCategory, number>;
  bySeverity: Record<Severity, number>;
  byRule: Record<string, number>;
  topOffenders: Offender[];
}

export interface AnalyzerDeps {
  query: QueryEngine;
  /** Required only by analyzeAndRecord. */
  transactions?: TransactionRepository;
  findings?: FindingRepository;
  options?: Partial<AnalyzerOptions>;
  rules?: readonly Rule[];
  logger?: Logger;
}

function emptyCategoryCounts(): Record<FindingCategory, number> {
  return { security: 0, performance: 0, best_practice: 0 };
}

function emptySeverityCounts(): Record<Severity, number> {
  return { info: 0, warning: 0, high: 0 };
}

// ============================================================
// Analyzer
// ============================================================

export class Analyzer {
  private readonly query: QueryEngine;
  private readonly transactions?: TransactionRepository;
  private readonly findingRepo?: FindingRepository;
  private readonly options: AnalyzerOptions;
  private readonly rules: readonly Rule[];
  private readonly logger: Logger;

  constructor(deps: AnalyzerDeps) {
    this.query = deps.query;
    this.transactions = deps.transactions;
    this.findingRepo = deps.findings;
    this.options = { ...DEFAULT_ANALYZER_OPTIONS, ...deps.options };
    this.rules = deps.rules ?? DEFAULT_RULES;
    this.logger = deps.logger ?? getLogger();
  }

  /** Findings for one transaction. Rules that fail are dropped silently here. */
  analyze(tx: Transaction): Finding[] {
    return this.analyzeDetailed(tx).findings;
  }

  /** Findings plus the rules that could not be evaluated on this transaction. */
  analyzeDetailed(tx: Transaction): DetailedAnalysis {
    const findings: Finding[] = [];
    const skipped: SkippedRule[] = [];

    for (const rule of this.rules) {
      try {
        for (const hit of rule.evaluate(tx, this.options)) {
          findings.push({
            transactionId: tx.id,
            rule: rule.id,
            category: rule.category,
            severity: hit.severity,
            message: hit.message,
          });
        }
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        skipped.push({ rule: rule.id, reason });
        this.logger.debug({ transactionId: tx.id, rule: rule.id, reason }, 'rule skipped');
      }
    }

    return { findings, skipped };
  }

  /**
   * Analyze the most recent `limit` transactions (within the engine's scope)
   * and summarize the findings.
   *
   * @throws InvalidQueryError when `criteria` is malformed
   */
  analyzeSession(limit = 100, criteria: QueryCriteria = {}): SessionAnalysis {
    const byCategory = emptyCategoryCounts();
    const bySeverity = emptySeverityCounts();
    const byRule: Record<string, number> = {};
    const offenders: Offender[] = [];
    let analyzed = 0;
    let totalFindings = 0;

    for (const tx of this.query.find({ ...criteria, limit })) {
      analyzed++;
      const findings = this.analyze(tx);
      if (findings.length === 0) {
        continue;
      }
      let score = 0;
      for (const f of findings) {
        byCategory[f.category]++;
        bySeverity[f.severity]++;
        byRule[f.rule] = (byRule[f.rule] ?? 0) + 1;
        score += SEVERITY_WEIGHTS[f.severity];
      }
      totalFindings += findings.length;
      offenders.push({
        transactionId: tx.id,
        method: tx.method,
        url: tx.url,
        score,
        findings: findings.length,
      });
    }

    offenders.sort((a, b) => b.score - a.score || b.transactionId - a.transactionId);

    return {
      analyzed,
      totalFindings,
      byCategory,
      bySeverity,
      byRule,
      topOffenders: offenders.slice(0, TOP_OFFENDERS),
    };
  }

  /**
   * Analyze one stored transaction, persist its findings and mark it analyzed.
   *
   * @throws NotFoundError when the id is absent or outside the scope
   */
  analyzeAndRecord(id: number): DetailedAnalysis {
    if (!this.transactions || !this.findingRepo) {
      throw new Error('analyzeAndRecord requires transaction and finding repositories');
    }
    const result = this.analyzeDetailed(this.query.get(id));
    this.findingRepo.replaceForTransaction(id, result.findings);
    this.transactions.markAnalyzed(id);
    this.logger.info(
      { transactionId: id, findings: result.findings.length, skipped: result.skipped.length },
      'transaction analyzed',
    );
    return result;
  }
}
