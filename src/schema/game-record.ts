/**
 * Game Record Schema
 *
 * Validates the decoded game record once at the boundary. Two shapes are
 * accepted: the normalized record the tracker works on, and the NBA.com
 * game page payload (props.pageProps.game / playByPlay), which is
 * converted to the normalized shape.
 */

import { z } from 'zod';

import { StructuralError } from '../errors/index.js';

// ============ Field Helpers ============

/** Free text that may be missing or null in older records */
const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value ? value : undefined));

const optionalId = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? undefined);

// ============ Normalized Record ============

export const ActionSchema = z.object({
  actionNumber: z.number().int(),
  period: z.number().int().min(1),
  clock: text,
  teamId: optionalId,
  personId: optionalId,
  playerName: optionalText,
  actionType: text,
  description: text,
});

export const PlayerRecordSchema = z.object({
  personId: z.number().int(),
  firstName: text,
  familyName: text,
  displayName: optionalText,
  jersey: text,
  position: text,
  statistics: z
    .object({ minutes: text })
    .nullish()
    .transform((stats) => stats ?? { minutes: '' }),
});

export const TeamRecordSchema = z.object({
  id: z.number().int(),
  players: z.array(PlayerRecordSchema),
});

export const GameRecordSchema = z
  .object({
    gameId: z.string().default(''),
    homeTeam: TeamRecordSchema,
    awayTeam: TeamRecordSchema,
    actions: z.array(ActionSchema),
  })
  .refine((game) => game.homeTeam.id !== game.awayTeam.id, {
    message: 'Home and away team ids must differ',
    path: ['awayTeam', 'id'],
  });

export type Action = z.output<typeof ActionSchema>;
export type PlayerRecord = z.output<typeof PlayerRecordSchema>;
export type TeamRecord = z.output<typeof TeamRecordSchema>;
export type GameRecord = z.output<typeof GameRecordSchema>;
export type GameRecordInput = z.input<typeof GameRecordSchema>;
export type ActionInput = z.input<typeof ActionSchema>;
export type PlayerRecordInput = z.input<typeof PlayerRecordSchema>;

// ============ NBA.com Page Payload ============

const NbaPlayerSchema = z.object({
  personId: z.number().int(),
  firstName: text,
  familyName: text,
  nameI: optionalText,
  jerseyNum: text,
  position: text,
  statistics: z
    .object({ minutes: text })
    .nullish()
    .transform((stats) => stats ?? { minutes: '' }),
});

const NbaTeamSchema = z.object({
  teamId: z.number().int(),
  players: z.array(NbaPlayerSchema),
});

export const NbaGamePayloadSchema = z.object({
  props: z.object({
    pageProps: z.object({
      game: z.object({
        gameId: z.string(),
        homeTeam: NbaTeamSchema,
        awayTeam: NbaTeamSchema,
      }),
      playByPlay: z.object({
        actions: z.array(ActionSchema),
      }),
    }),
  }),
});

export type NbaGamePayload = z.output<typeof NbaGamePayloadSchema>;

type NbaTeam = z.output<typeof NbaTeamSchema>;

function toTeamRecord(team: NbaTeam): TeamRecord {
  return {
    id: team.teamId,
    players: team.players.map((player) => ({
      personId: player.personId,
      firstName: player.firstName,
      familyName: player.familyName,
      displayName: player.nameI,
      jersey: player.jerseyNum,
      position: player.position,
      statistics: { minutes: player.statistics.minutes },
    })),
  };
}

// ============ Parsing ============

function toStructuralError(error: z.ZodError): StructuralError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
  const message = issue ? issue.message : 'Invalid game record';
  return new StructuralError(`Invalid game record at ${field}: ${message}`, field, {
    issueCount: error.issues.length,
  });
}

/**
 * Validate a normalized game record.
 *
 * @throws StructuralError naming the first offending path
 */
export function parseGameRecord(input: unknown): GameRecord {
  const result = GameRecordSchema.safeParse(input);
  if (!result.success) {
    throw toStructuralError(result.error);
  }
  return result.data;
}

/**
 * Validate an NBA.com game page payload and convert it to a game record.
 *
 * @throws StructuralError naming the first offending path
 */
export function parseNbaGamePayload(input: unknown): GameRecord {
  const result = NbaGamePayloadSchema.safeParse(input);
  if (!result.success) {
    throw toStructuralError(result.error);
  }

  const { game, playByPlay } = result.data.props.pageProps;
  return parseGameRecord({
    gameId: game.gameId,
    homeTeam: toTeamRecord(game.homeTeam),
    awayTeam: toTeamRecord(game.awayTeam),
    actions: playByPlay.actions,
  });
}

/**
 * Accept either input shape. Objects with a top-level `props` key are
 * treated as NBA.com page payloads.
 */
export function parseGameInput(input: unknown): GameRecord {
  if (typeof input === 'object' && input !== null && 'props' in input) {
    return parseNbaGamePayload(input);
  }
  return parseGameRecord(input);
}
