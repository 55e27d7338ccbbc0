import { z } from 'zod';
import { MAX_BOARD_RADIUS, MIN_BOARD_RADIUS } from '../types/game';

// Persisted game state. Arenas and the cell → group index are derived data
// and are rebuilt from `cells` on restore.

export const PlayerIndexSchema = z.union([z.literal(0), z.literal(1)]);

export const ConnectionMaskSchema = z.number().int().min(1).max(63);

export const TileByteSchema = z.number().int().min(0).max(255);

export const GameSnapshotSchema = z
  .object({
    radius: z.number().int().min(MIN_BOARD_RADIUS).max(MAX_BOARD_RADIUS),
    cells: z.array(TileByteSchema),
    hands: z.tuple([z.array(ConnectionMaskSchema), z.array(ConnectionMaskSchema)]),
    currentPlayer: PlayerIndexSchema,
    passCount: z.number().int().min(0).max(2),
    moveNumber: z.number().int().min(1),
  })
  .refine((snapshot) => snapshot.cells.length === 3 * snapshot.radius * (snapshot.radius + 1) + 1, {
    message: 'cells length does not match the board radius',
    path: ['cells'],
  })
  .refine((snapshot) => snapshot.cells.every((tile) => tile === 0 || (tile & 0x3f) !== 0), {
    message: 'occupied cells must carry at least one connection',
    path: ['cells'],
  })
  .refine((snapshot) => snapshot.hands.every((hand) => new Set(hand).size === hand.length), {
    message: 'hands must not repeat a connection mask',
    path: ['hands'],
  });

export type GameSnapshot = z.infer<typeof GameSnapshotSchema>;
