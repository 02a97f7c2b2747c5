import type {
  AgentAction,
  ClarifyAction,
  ComposedResponse,
  ResponseMessage,
} from '../domain/entities/AgentAction.js';
import type { RetrievalResult } from '../domain/entities/DocumentChunk.js';
import type { ToolName } from '../domain/entities/IntentSchema.js';
import type {
  EmissionsEstimate,
  ErrorKind,
  RouteSummary,
  ToolPayload,
  ToolResult,
  WeatherReport,
} from '../domain/entities/ToolResult.js';

export interface ResponseComposerConfig {
  /** User-facing capability names ("weather", "route planning") */
  capabilities: Record<ToolName, string>;
  /** Capability name used when the knowledge retrieval path fails */
  knowledgeCapability: string;
}

export const GENERIC_APOLOGY = "I couldn't complete that, please try again.";
export const INVALID_INPUT = "I couldn't use one of the details you gave. Could you rephrase it?";
export const NARROWING_FOLLOW_UP =
  "I don't have reliable information on that yet. Could you narrow it down, for example to a destination or a type of trip?";
export const EMPTY_KNOWLEDGE_DEFLECTION =
  "My travel knowledge base is empty right now, so I can't answer that reliably. I can still help with routes, weather and trip emissions.";

function text(value: string): ResponseMessage {
  return { type: 'text', text: value };
}

function joinAlternatives(items: string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} or ${items[items.length - 1]}`;
}

function formatDuration(minutes: number): string {
  const rounded = Math.max(1, Math.round(minutes));
  const hours = Math.floor(rounded / 60);
  const rest = rounded % 60;
  if (hours === 0) return `${rest} min`;
  return rest === 0 ? `${hours} h` : `${hours} h ${rest} min`;
}

function unavailable(capability: string): string {
  return `Sorry, the ${capability} service isn't available right now. Please try again in a moment.`;
}

/**
 * Renders an action and its result into messages for the transport layer. Pure.
 */
export class ResponseComposer {
  constructor(private readonly config: ResponseComposerConfig) {}

  compose(sessionId: string, action: AgentAction): ComposedResponse {
    return { sessionId, action: action.type, messages: this.render(action) };
  }

  private render(action: AgentAction): ResponseMessage[] {
    switch (action.type) {
      case 'ask_slot':
        return action.rejectedValue === undefined
          ? [text(action.slot.prompt)]
          : [text(`I can't work with "${action.rejectedValue}" as the ${action.slot.label}. ${action.slot.prompt}`)];
      case 'clarify':
        return this.renderClarification(action);
      case 'clarification_exhausted':
        return [
          text(`I can't continue without your ${action.slot.label}. Let's start over whenever you're ready.`),
        ];
      case 'tool_result':
        return this.renderToolResult(action.result);
      case 'retrieval':
        return this.renderRetrieval(action.result);
      case 'failure':
        return [text(action.capability ? unavailable(action.capability) : GENERIC_APOLOGY)];
      case 'background':
        return [...this.render(action.answer), ...this.render(action.resume)];
    }
  }

  private renderClarification(action: ClarifyAction): ResponseMessage[] {
    const question = `Did you mean ${joinAlternatives(action.options.map((option) => option.display))}?`;
    const lead = action.repeated ? `Sorry, I didn't catch which ${action.surfaceText} you meant. ` : '';

    return [
      text(`${lead}${question}`),
      {
        type: 'options',
        prompt: `Which ${action.surfaceText} do you mean?`,
        options: action.options.map((option) => ({
          ordinal: option.ordinal,
          id: option.candidate.id,
          label: option.display,
        })),
      },
    ];
  }

  private renderToolResult(result: ToolResult): ResponseMessage[] {
    if (!result.success) {
      return [text(this.failureText(result.errorKind, result.tool))];
    }
    return [
      ...this.renderPayload(result.payload),
      { type: 'data', kind: result.payload.kind, payload: result.payload },
    ];
  }

  private renderPayload(payload: ToolPayload): ResponseMessage[] {
    switch (payload.kind) {
      case 'weather':
        return this.renderWeather(payload);
      case 'routing':
        return [text(this.describeRoute(payload))];
      case 'emissions':
        return this.renderEmissions(payload);
    }
  }

  private renderWeather(report: WeatherReport): ResponseMessage[] {
    const chance = Math.round(report.precipitationProbability * 100);
    const messages = [
      text(
        `The forecast for ${report.location} on ${report.date}: ${report.condition.toLowerCase()}, ` +
          `between ${report.temperatureMin}°C and ${report.temperatureMax}°C with a ${chance}% chance of precipitation.`
      ),
    ];
    if (report.recommendations.length > 0) {
      messages.push(text(`Travel tips: ${report.recommendations.join('; ')}.`));
    }
    return messages;
  }

  private describeRoute(route: RouteSummary): string {
    return (
      `The ${route.mode} route from ${route.origin} to ${route.destination} is about ` +
      `${Math.round(route.distanceKm)} km and takes around ${formatDuration(route.durationMinutes)}.`
    );
  }

  private renderEmissions(estimate: EmissionsEstimate): ResponseMessage[] {
    const travellers = estimate.passengers === 1 ? '1 traveller' : `${estimate.passengers} travellers`;
    const messages = [
      text(
        `A ${Math.round(estimate.distanceKm)} km trip by ${estimate.mode} for ${travellers} emits about ` +
          `${estimate.totalKg.toFixed(1)} kg CO2e (sustainability grade ${estimate.grade}). ` +
          `Offsetting it would cost roughly $${estimate.offsetPriceUsd.toFixed(2)}.`
      ),
    ];
    if (estimate.recommendations.length > 0) {
      messages.push(text(estimate.recommendations.join(' ')));
    }
    if (estimate.alternatives.length > 0) {
      const options = estimate.alternatives.map(
        (alternative) =>
          `${alternative.mode} at about ${alternative.totalKg.toFixed(1)} kg CO2e ` +
          `(saves ${alternative.savingKg.toFixed(1)} kg)`
      );
      messages.push(text(`Lower-emission options for the same trip: ${options.join(', ')}.`));
    }
    return messages;
  }

  private renderRetrieval(result: RetrievalResult): ResponseMessage[] {
    if (result.grounded) {
      const messages = [text(result.groundedAnswer)];
      if (result.sources.length > 0) {
        messages.push(text(`Sources: ${result.sources.join(', ')}`));
      }
      return messages;
    }

    switch (result.errorKind) {
      case 'EmptyIndex':
        return [text(EMPTY_KNOWLEDGE_DEFLECTION)];
      case 'NoRelevantContext':
        return [text(NARROWING_FOLLOW_UP)];
      case 'ToolTimeout':
      case 'ToolUnavailable':
        return [text(unavailable(this.config.knowledgeCapability))];
    }
  }

  private failureText(errorKind: ErrorKind, tool: ToolName | null): string {
    if ((errorKind === 'ToolTimeout' || errorKind === 'ToolUnavailable') && tool !== null) {
      return unavailable(this.config.capabilities[tool]);
    }
    if (errorKind === 'InvalidInput') {
      return INVALID_INPUT;
    }
    return GENERIC_APOLOGY;
  }
}
