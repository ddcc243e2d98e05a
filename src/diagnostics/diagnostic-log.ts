/**
 * Diagnostic Log
 *
 * Collects the non-fatal data problems found while processing one game.
 * Diagnostics are always returned to the caller; printing them is opt-in.
 */

import type { Diagnostic, DiagnosticCode } from '../types/index.js';

export class DiagnosticLog {
  private readonly entries: Diagnostic[] = [];

  constructor(
    private readonly tag: string = 'LineupTracker',
    private readonly echo: boolean = false
  ) {}

  /**
   * Record a diagnostic.
   */
  add(
    code: DiagnosticCode,
    message: string,
    details: { actionNumber?: number; context?: Record<string, unknown> } = {}
  ): void {
    const diagnostic: Diagnostic = { code, message };
    if (details.actionNumber !== undefined) diagnostic.actionNumber = details.actionNumber;
    if (details.context) diagnostic.context = details.context;

    this.entries.push(diagnostic);

    if (this.echo) {
      const where = details.actionNumber !== undefined ? ` (action #${details.actionNumber})` : '';
      console.warn(`[${this.tag}] ${code}${where}: ${message}`);
    }
  }

  /**
   * Count diagnostics with the given code.
   */
  count(code: DiagnosticCode): number {
    return this.entries.filter((entry) => entry.code === code).length;
  }

  /**
   * Snapshot of all recorded diagnostics, in recording order.
   */
  toArray(): Diagnostic[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  get size(): number {
    return this.entries.length;
  }
}
