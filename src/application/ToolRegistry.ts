import type { IntentCatalog, ToolName } from '../domain/entities/IntentSchema.js';
import type { SlotValue } from '../domain/entities/Slot.js';
import { toolFailure, toolSuccess, type ToolResult } from '../domain/entities/ToolResult.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { ToolInputError, type IToolHandler, type ToolInputs } from '../domain/ports/IToolHandler.js';
import { isTimeoutError, withTimeout } from '../infrastructure/utils/withTimeout.js';

export interface ToolRegistryConfig {
  toolTimeoutMs: number;
}

/**
 * Thrown at startup when the intent table and the registered handlers disagree
 */
export class CatalogValidationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid intent catalog: ${problems.join('; ')}`);
    this.name = 'CatalogValidationError';
  }
}

/**
 * Tool results for the lifetime of one turn, keyed by tool and normalized input.
 * A new cache is created per turn; nothing is shared across turns.
 */
export class ToolResultCache {
  private readonly results = new Map<string, ToolResult>();

  static key(tool: ToolName, inputs: ToolInputs): string {
    const normalized = Object.keys(inputs)
      .sort()
      .map((name) => `${name}=${inputs[name].id.trim().toLowerCase()}`);
    return `${tool}|${normalized.join('&')}`;
  }

  get(key: string): ToolResult | undefined {
    return this.results.get(key);
  }

  set(key: string, result: ToolResult): void {
    this.results.set(key, result);
  }

  get size(): number {
    return this.results.size;
  }
}

/**
 * Maps intents to capability handlers through the static intent catalog and invokes them.
 * Never throws from `dispatch`: every failure becomes a failed ToolResult.
 */
export class ToolRegistry {
  private readonly handlers = new Map<ToolName, IToolHandler>();
  private readonly logger: ILogger;

  constructor(
    private readonly catalog: IntentCatalog,
    logger: ILogger,
    private readonly config: ToolRegistryConfig
  ) {
    this.logger = logger.child({ component: 'ToolRegistry' });
  }

  register(handler: IToolHandler): void {
    if (this.handlers.has(handler.name)) {
      this.logger.warn('Tool already registered, replacing', { tool: handler.name });
    }
    this.handlers.set(handler.name, handler);
  }

  /**
   * Every tool-targeted intent must resolve to exactly one handler whose
   * required inputs are all required slots of that intent.
   */
  validateCatalog(): void {
    const problems: string[] = [];

    for (const [intent, schema] of this.catalog) {
      if (schema.intent !== intent) {
        problems.push(`entry "${intent}" declares intent "${schema.intent}"`);
      }
      if (schema.target.kind !== 'tool') continue;

      const handler = this.handlers.get(schema.target.tool);
      if (!handler) {
        problems.push(`intent "${intent}" targets unregistered tool "${schema.target.tool}"`);
        continue;
      }

      for (const input of handler.requiredInputs) {
        const declared = schema.required.find((slot) => slot.name === input.name);
        if (!declared) {
          problems.push(`intent "${intent}" does not require input "${input.name}" of tool "${handler.name}"`);
        } else if (declared.entityType !== input.entityType) {
          problems.push(
            `intent "${intent}" declares "${input.name}" as ${declared.entityType}, tool "${handler.name}" expects ${input.entityType}`
          );
        }
      }
    }

    if (problems.length > 0) {
      throw new CatalogValidationError(problems);
    }

    this.logger.info('Intent catalog validated', {
      intents: [...this.catalog.keys()],
      tools: [...this.handlers.keys()],
    });
  }

  capabilityOf(tool: ToolName | null): string {
    if (tool === null) return 'travel planning';
    return this.handlers.get(tool)?.capability ?? tool;
  }

  async dispatch(
    intent: string,
    filledSlots: Readonly<Record<string, SlotValue>>,
    cache?: ToolResultCache
  ): Promise<ToolResult> {
    const schema = this.catalog.get(intent);
    if (!schema || schema.target.kind !== 'tool') {
      this.logger.error('Dispatch for intent without a tool target', undefined, {
        intent,
        errorKind: 'UnknownIntent',
      });
      return toolFailure(null, 'UnknownIntent');
    }

    const tool = schema.target.tool;
    const handler = this.handlers.get(tool);
    if (!handler) {
      this.logger.error('No handler registered for tool', undefined, {
        intent,
        tool,
        errorKind: 'UnknownIntent',
      });
      return toolFailure(tool, 'UnknownIntent');
    }

    const missing = handler.requiredInputs
      .filter((input) => filledSlots[input.name]?.entityType !== input.entityType)
      .map((input) => input.name);
    if (missing.length > 0) {
      this.logger.error('Dispatch with incomplete input', undefined, {
        intent,
        tool,
        missing,
        errorKind: 'IncompleteInput',
      });
      return toolFailure(tool, 'IncompleteInput');
    }

    const inputs: Record<string, SlotValue> = {};
    for (const slot of [...schema.required, ...schema.optional]) {
      const value = filledSlots[slot.name];
      if (value) inputs[slot.name] = value;
    }

    const cacheKey = ToolResultCache.key(tool, inputs);
    const cached = cache?.get(cacheKey);
    if (cached) {
      this.logger.debug('Tool result served from turn cache', { tool, cacheKey });
      return cached;
    }

    const result = await this.invoke(handler, inputs);
    cache?.set(cacheKey, result);
    return result;
  }

  private async invoke(handler: IToolHandler, inputs: ToolInputs): Promise<ToolResult> {
    const startedAt = Date.now();
    try {
      const payload = await withTimeout(`tool:${handler.name}`, this.config.toolTimeoutMs, (signal) =>
        handler.execute(inputs, signal)
      );
      this.logger.info('Tool executed', { tool: handler.name, durationMs: Date.now() - startedAt });
      return toolSuccess(handler.name, payload);
    } catch (error) {
      if (error instanceof ToolInputError) {
        this.logger.info('Tool rejected its input', { tool: handler.name, slot: error.slot, reason: error.message });
        return toolFailure(handler.name, 'InvalidInput', error.slot);
      }
      const errorKind = isTimeoutError(error) ? 'ToolTimeout' : 'ToolUnavailable';
      this.logger.warn('Tool execution failed', {
        tool: handler.name,
        errorKind,
        durationMs: Date.now() - startedAt,
        error: error instanceof Error ? error.message : String(error),
      });
      return toolFailure(handler.name, errorKind);
    }
  }
}
