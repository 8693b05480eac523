/**
 * Turns raw classifier JSON into a validated intent.
 * The action label is checked against the closed action set before dispatch.
 */

import { z } from 'zod';
import { ClassifierError } from '../core/errors';
import { ExtractedIntent, INTAKE_ACTIONS, IntakeAction, IntentData } from '../types/core';

const ACTIONS: ReadonlySet<string> = new Set(INTAKE_ACTIONS);

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(value => {
    if (value === null || value === undefined) return undefined;
    const text = String(value).trim();
    return text ? text : undefined;
  })
  .catch(undefined);

const IntentSchema = z.object({
  action: z.string().catch('wait').default('wait'),
  feedback: z.string().catch('').default(''),
  data: z
    .object({
      project: optionalText,
      title: optionalText,
      deadline: optionalText
    })
    .passthrough()
    .catch({})
    .default({}),
  valid: z.boolean().optional().catch(undefined),
  es_valido: z.boolean().optional().catch(undefined)
});

function isIntakeAction(value: string): value is IntakeAction {
  return ACTIONS.has(value);
}

export function interpretIntent(raw: Record<string, unknown>): ExtractedIntent {
  const parsed = IntentSchema.parse(raw);
  const rawAction = parsed.action.trim().toLowerCase();

  const data: IntentData = {};
  if (parsed.data.project) data.project = parsed.data.project;
  if (parsed.data.title) data.title = parsed.data.title;
  if (parsed.data.deadline) data.deadline = parsed.data.deadline;

  return {
    action: isIntakeAction(rawAction) ? rawAction : 'unrecognized',
    rawAction,
    feedback: parsed.feedback,
    data,
    valid: parsed.valid ?? parsed.es_valido
  };
}

/**
 * Models sometimes wrap JSON in a markdown fence
 */
export function parseClassifierJson(text: string): Record<string, unknown> {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  const body = fenced ? fenced[1] : trimmed;

  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch (error) {
    throw new ClassifierError('Classifier returned invalid JSON', { cause: error });
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ClassifierError('Classifier returned JSON that is not an object');
  }
  return Object.fromEntries(Object.entries(value));
}
