/**
 * Type Definitions Index
 *
 * Re-exports all types for cleaner imports throughout the codebase.
 *
 * Usage:
 *   import type { GameRecord, LineupState } from '../types/index.js';
 */

export type * from './lineup.js';
export type {
  Action,
  PlayerRecord,
  TeamRecord,
  GameRecord,
  GameRecordInput,
  ActionInput,
  PlayerRecordInput,
  NbaGamePayload,
} from '../schema/game-record.js';
