import { Issue, advisory, fatal } from '../../core/interfaces/IBackendAdapter.js';

export type Env = Record<string, string | undefined>;

/**
 * Environment variable that may also be set per model, e.g.
 * OLLAMA_API_ENDPOINT and OLLAMA_API_ENDPOINT_llama3_2
 */
export interface ScopedVariable {
  name: string;
  defaultValue?: string;
  byModel: Record<string, string>;
}

/**
 * Model name as it appears in model-specific variable names:
 * `-`, `/`, `.`, `:` and spaces become `_`
 */
export function modelIdentifier(modelName: string): string {
  return modelName.replace(/[-/.: ]/g, '_');
}

export function readScopedVariable(env: Env, name: string): ScopedVariable {
  const prefix = `${name}_`;
  const byModel: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(prefix) && value) {
      byModel[key.slice(prefix.length)] = value;
    }
  }
  const defaultValue = env[name] ? env[name] : undefined;
  return { name, defaultValue, byModel };
}

/**
 * Value for a model, falling back to the unscoped variable
 */
export function scopedValue(variable: ScopedVariable, modelName?: string): string | undefined {
  if (modelName !== undefined) {
    const specific = variable.byModel[modelIdentifier(modelName)];
    if (specific) return specific;
  }
  return variable.defaultValue;
}

/**
 * Startup check: a required variable must be set globally or for at least one model
 */
export function checkScopedVariable(variable: ScopedVariable, required: boolean): Issue[] {
  const scopedCount = Object.keys(variable.byModel).length;
  if (variable.defaultValue !== undefined) return [];
  if (scopedCount > 0) {
    return [advisory(`${variable.name} is not set; only model-specific ${variable.name}_<model> values are available`)];
  }
  return required
    ? [fatal(`Environment variable ${variable.name} is not set`)]
    : [advisory(`Optional environment variable ${variable.name} is not set`)];
}

/**
 * Per-record check that a value resolves for the record's model
 */
export function checkScopedValueFor(variable: ScopedVariable, modelName?: string): Issue[] {
  if (scopedValue(variable, modelName) !== undefined) return [];
  if (modelName === undefined) {
    return [fatal(`Environment variable ${variable.name} is not set`)];
  }
  return [fatal(`Neither ${variable.name}_${modelIdentifier(modelName)} nor ${variable.name} is set`)];
}
