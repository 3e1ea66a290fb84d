import { z } from 'zod';
import { JobFileError } from '../errors.js';

export type JsonObject = Record<string, unknown>;

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface ContentPart {
  type: string;
  [key: string]: unknown;
}

/**
 * Prompt value of a record, classified once when the job file is read.
 * A scripted turn list is a plain array of user messages sent one after another.
 */
export type PromptShape =
  | { kind: 'plain-text'; text: string }
  | { kind: 'turn-list'; turns: ChatTurn[]; scripted: boolean }
  | { kind: 'multimodal-parts'; parts: ContentPart[] };

export type ResponseValue = string | string[];

export type RecordState = 'pending' | 'succeeded' | 'failed';

/**
 * One line of a job file plus its processing state
 */
export interface PromptRecord {
  index: number; // 1-based line number in the job file
  id?: string | number;
  api?: string;
  modelName?: string;
  group?: string;
  parameters: JsonObject;
  shape: PromptShape;
  source: JsonObject; // the parsed line, unknown fields included
  attempts: number;
  state: RecordState;
  sentAt?: Date;
  response?: ResponseValue;
  error?: string;
}

const RecordFieldsSchema = z
  .object({
    id: z
      .union([
        z.string(),
        z.number().refine((id) => !Number.isInteger(id) || Number.isSafeInteger(id), {
          message: 'too large to keep exactly; write it as a string',
        }),
      ])
      .optional(),
    api: z.string().min(1, 'api must not be empty').optional(),
    model_name: z.string().optional(),
    group: z.string().min(1, 'group must not be empty').optional(),
    parameters: z.record(z.unknown()).optional(),
  })
  .passthrough();

const ChatTurnSchema = z
  .object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string(),
  })
  .strict();

const ContentPartSchema = z.object({ type: z.string().min(1) }).passthrough();

const PromptShapeSchema = z.union([
  z.string().transform((text): PromptShape => ({ kind: 'plain-text', text })),
  z
    .array(z.string())
    .nonempty()
    .transform((messages): PromptShape => ({
      kind: 'turn-list',
      turns: messages.map((content) => ({ role: 'user' as const, content })),
      scripted: true,
    })),
  z
    .array(ChatTurnSchema)
    .nonempty()
    .transform((turns): PromptShape => ({ kind: 'turn-list', turns, scripted: false })),
  z
    .array(ContentPartSchema)
    .nonempty()
    .transform((parts): PromptShape => ({ kind: 'multimodal-parts', parts })),
]);

/**
 * Classify a raw prompt value, or return null if it has none of the known shapes
 */
export function toPromptShape(value: unknown): PromptShape | null {
  const result = PromptShapeSchema.safeParse(value);
  return result.success ? result.data : null;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one line of a job file into a record.
 * Throws JobFileError naming the line when the line is not a usable record.
 */
export function parsePromptRecord(line: string, lineNumber: number, fileName: string): PromptRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new JobFileError(`invalid JSON (${reason})`, fileName, lineNumber);
  }

  if (!isJsonObject(parsed)) {
    throw new JobFileError('expected a JSON object', fileName, lineNumber);
  }
  if (!('prompt' in parsed)) {
    throw new JobFileError("missing required field 'prompt'", fileName, lineNumber);
  }

  const fields = RecordFieldsSchema.safeParse(parsed);
  if (!fields.success) {
    const details = fields.error.errors
      .map((err) => `${err.path.join('.') || 'record'}: ${err.message}`)
      .join('; ');
    throw new JobFileError(details, fileName, lineNumber);
  }

  const shape = toPromptShape(parsed.prompt);
  if (!shape) {
    throw new JobFileError(
      "'prompt' must be a string, a list of strings, a list of {role, content} turns, or a list of typed parts",
      fileName,
      lineNumber
    );
  }

  return {
    index: lineNumber,
    id: fields.data.id,
    api: fields.data.api,
    modelName: fields.data.model_name,
    group: fields.data.group,
    parameters: fields.data.parameters ?? {},
    shape,
    source: parsed,
    attempts: 0,
    state: 'pending',
  };
}

/**
 * Short text view of a prompt for log excerpts
 */
export function describePrompt(shape: PromptShape): string {
  switch (shape.kind) {
    case 'plain-text':
      return shape.text;
    case 'turn-list':
      return shape.turns.map((turn) => (shape.scripted ? turn.content : `${turn.role}: ${turn.content}`)).join(' | ');
    case 'multimodal-parts':
      return shape.parts
        .map((part) => (typeof part.text === 'string' ? part.text : `[${part.type}]`))
        .join(' ');
  }
}

export function describeResponse(response: ResponseValue): string {
  return Array.isArray(response) ? response.join(' | ') : response;
}

/**
 * Label used in logs for the record identity
 */
export function recordLabel(record: PromptRecord): string {
  return record.id === undefined ? `${record.index}` : `${record.index} (id: ${record.id})`;
}

/**
 * Completed-file line for a record in its terminal state.
 * Unknown input fields are kept; stale response/error fields from the input are replaced.
 */
export function toOutputLine(record: PromptRecord): JsonObject {
  const { response: _previousResponse, error: _previousError, ...rest } = record.source;
  const line: JsonObject = { ...rest };
  if (record.sentAt) {
    line.timestamp_sent = record.sentAt.toISOString();
  }
  if (record.state === 'succeeded' && record.response !== undefined) {
    line.response = record.response;
  } else {
    line.error = record.error ?? 'record was not processed';
  }
  line.attempts = record.attempts;
  return line;
}
