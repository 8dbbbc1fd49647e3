import { randomInt } from 'crypto';
import { z } from 'zod';
import { UnexpectedError, defineTask, type TaskType } from '@taskrun/core';

/**
 * Returns an integer in [min, max]
 */
export type RandomSource = (min: number, max: number) => number;

export const DiceRollParamsSchema = z.object({
  launchNumber: z.number().int().positive(),
});

export const GameContextSchema = z.object({
  env: z.string().default('production'),
});

export type DiceRollParams = z.infer<typeof DiceRollParamsSchema>;
export type GameContext = z.infer<typeof GameContextSchema>;

// The die has a seventh face, which is not allowed
const FORBIDDEN_FACE = 7;

export function scoreRoll(roll: number): number {
  switch (roll) {
    case 6:
      return 60;
    case 2:
    case 3:
    case 4:
    case 5:
      return roll;
    default:
      return 100;
  }
}

const rollDie: RandomSource = (min, max) => randomInt(min, max + 1);

/**
 * Build the DiceRoll task type on top of a random source
 */
export function createDiceRoll(random: RandomSource = rollDie): TaskType<DiceRollParams, GameContext> {
  return defineTask<DiceRollParams, GameContext>({
    path: 'examples.DiceRoll',
    requiredParams: ['launchNumber'],
    paramsSchema: DiceRollParamsSchema,
    metadataSchema: GameContextSchema,
    run: (result, { params, metadata, logger }) => {
      const roll = random(1, FORBIDDEN_FACE);
      const launch = params.launchNumber;

      logger.debug('Dice rolled', { launch, roll, env: metadata?.env });

      if (roll === FORBIDDEN_FACE) {
        return new UnexpectedError('non-regulatory dice!', { launch });
      }

      return {
        ...result,
        stdout: `Roll ${launch}: you made a ${roll}`,
        retval: {
          ...result.retval,
          [`LaunchNumber-${launch}`]: roll,
          [`Score-${launch}`]: scoreRoll(roll),
        },
      };
    },
  });
}

export const DiceRoll = createDiceRoll();
