import { z } from 'zod';

import type { SerializedComponentStore } from './component-store.js';
import { MalformedPersistedStateError } from './simulation-errors.js';

export const SIMULATION_SAVE_SCHEMA_VERSION = 1;

const finiteNumber = z.number().refine(Number.isFinite, {
  message: 'Value must be a finite number.',
});

/** JSON has no Infinity, so unbounded amounts are written as this token. */
const INFINITY_TOKEN = 'Infinity';

type PersistedAmount = number | typeof INFINITY_TOKEN;

const persistedAmount = z
  .union([
    z.number(),
    z.literal(INFINITY_TOKEN).transform(() => Number.POSITIVE_INFINITY),
  ])
  .refine((value) => value >= 0, {
    message: 'Value must be a non-negative number or "Infinity".',
  });

const saveFormatV1Schema = z
  .object({
    version: z.literal(SIMULATION_SAVE_SCHEMA_VERSION),
    savedAt: finiteNumber.refine((value) => value >= 0, {
      message: 'savedAt must be a non-negative timestamp.',
    }),
    name: z.string().min(1),
    totalDuration: persistedAmount,
    paused: z.boolean(),
    resources: z.array(
      z.object({ id: z.string().min(1), value: persistedAmount }).strict(),
    ),
    upgrades: z.array(
      z
        .object({
          id: z.string().min(1),
          level: z.number().int().nonnegative(),
        })
        .strict(),
    ),
  })
  .strict()
  .superRefine((save, ctx) => {
    reportDuplicateIds(save.resources, 'resources', ctx);
    reportDuplicateIds(save.upgrades, 'upgrades', ctx);
  });

export type SimulationSaveFormatV1 = Readonly<{
  readonly version: 1;
  readonly savedAt: number;
  readonly name: string;
  readonly totalDuration: number;
  readonly paused: boolean;
}> &
  SerializedComponentStore;

export type SimulationSaveFormat = SimulationSaveFormatV1;

function reportDuplicateIds(
  entries: readonly { readonly id: string }[],
  key: string,
  ctx: z.RefinementCtx,
): void {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key, index, 'id'],
        message: `Duplicate id "${entry.id}".`,
      });
      return;
    }
    seen.add(entry.id);
  });
}

const toPersistedAmount = (value: number): PersistedAmount =>
  value === Number.POSITIVE_INFINITY ? INFINITY_TOKEN : value;

/**
 * Encodes a save as UTF-8 JSON. The encoded form is validated against the
 * same schema {@link decodeSimulationSave} applies, so every save this
 * returns can be restored.
 *
 * @throws MalformedPersistedStateError when the state holds a negative or
 * NaN amount.
 */
export function encodeSimulationSave(save: SimulationSaveFormat): Uint8Array {
  const persisted = {
    ...save,
    totalDuration: toPersistedAmount(save.totalDuration),
    resources: save.resources.map((entry) => ({
      id: entry.id,
      value: toPersistedAmount(entry.value),
    })),
    upgrades: save.upgrades.map((entry) => ({ id: entry.id, level: entry.level })),
  };

  const result = saveFormatV1Schema.safeParse(persisted);
  if (!result.success) {
    throw new MalformedPersistedStateError(
      'Simulation state cannot be persisted.',
      describeIssues(result.error.issues),
    );
  }
  return new TextEncoder().encode(JSON.stringify(persisted));
}

/**
 * Decodes and validates persisted simulation bytes.
 *
 * @throws MalformedPersistedStateError when the bytes are not UTF-8 JSON or
 * do not describe a version 1 save.
 */
export function decodeSimulationSave(bytes: Uint8Array): SimulationSaveFormat {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new MalformedPersistedStateError(
      'Persisted simulation state is not valid UTF-8.',
      [describeError(error)],
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedPersistedStateError(
      'Persisted simulation state is not valid JSON.',
      [describeError(error)],
    );
  }

  return loadSimulationSaveFormat(parsed);
}

export function loadSimulationSaveFormat(value: unknown): SimulationSaveFormat {
  const version =
    typeof value === 'object' && value !== null && 'version' in value
      ? value.version
      : undefined;
  if (version !== SIMULATION_SAVE_SCHEMA_VERSION) {
    throw new MalformedPersistedStateError(
      `Unsupported simulation save version: ${String(version)}`,
    );
  }

  const result = saveFormatV1Schema.safeParse(value);
  if (!result.success) {
    throw new MalformedPersistedStateError(
      'Persisted simulation state failed validation.',
      describeIssues(result.error.issues),
    );
  }
  return result.data;
}

function describeIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join('.')}: ${issue.message}`
      : issue.message,
  );
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
