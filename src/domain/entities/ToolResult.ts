import type { ToolName } from './IntentSchema.js';

/**
 * Failure taxonomy shared by the dispatcher, the retrieval pipeline and the dialogue
 */
export type ErrorKind =
  | 'UnknownIntent'
  | 'IncompleteInput'
  | 'ToolTimeout'
  | 'ToolUnavailable'
  | 'InvalidInput'
  | 'EmptyIndex'
  | 'NoRelevantContext'
  | 'ClarificationExhausted';

export interface WeatherReport {
  kind: 'weather';
  location: string;
  date: string;
  temperatureMin: number;
  temperatureMax: number;
  condition: string;
  precipitationProbability: number;
  recommendations: string[];
}

export interface RouteSummary {
  kind: 'routing';
  origin: string;
  destination: string;
  mode: string;
  distanceKm: number;
  durationMinutes: number;
}

export type SustainabilityGrade = 'A' | 'B' | 'C' | 'D' | 'E' | 'F';

/** Another mode for the same distance, travellers and nights that emits less */
export interface EmissionAlternative {
  mode: string;
  totalKg: number;
  savingKg: number;
}

export interface EmissionsEstimate {
  kind: 'emissions';
  mode: string;
  distanceKm: number;
  passengers: number;
  nights: number;
  totalKg: number;
  grade: SustainabilityGrade;
  offsetKg: number;
  offsetPriceUsd: number;
  recommendations: string[];
  /** Lowest emissions first; empty when the chosen mode is already the cleanest */
  alternatives: EmissionAlternative[];
}

/**
 * Tool-specific payload, discriminated by `kind` (same value as the tool name)
 */
export type ToolPayload = RouteSummary | WeatherReport | EmissionsEstimate;

/**
 * Outcome of one dispatch. Immutable once produced.
 */
export type ToolResult =
  | { readonly success: true; readonly tool: ToolName; readonly payload: ToolPayload }
  | {
      readonly success: false;
      readonly tool: ToolName | null;
      readonly errorKind: ErrorKind;
      /** Slot whose value the tool rejected (InvalidInput only) */
      readonly invalidSlot?: string;
    };

export function toolSuccess(tool: ToolName, payload: ToolPayload): ToolResult {
  const result: ToolResult = { success: true, tool, payload };
  return Object.freeze(result);
}

export function toolFailure(tool: ToolName | null, errorKind: ErrorKind, invalidSlot?: string): ToolResult {
  const result: ToolResult =
    invalidSlot === undefined ? { success: false, tool, errorKind } : { success: false, tool, errorKind, invalidSlot };
  return Object.freeze(result);
}
