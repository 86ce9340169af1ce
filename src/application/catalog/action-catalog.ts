import { ACTION_INTENTS, isActionIntent, type ActionIntent } from '../../domain/enums/intent-type.js';
import { UnrecognizedIntentError } from '../../domain/errors/dialogue-errors.js';
import type { ActionDefinition, ActionDefinitions } from './action-definition.js';

/**
 * Read-only intent → ActionDefinition table, frozen at construction.
 *
 * Keyed by the closed ActionIntent union, so a missing definition fails to compile.
 */
export class ActionCatalog {
  private readonly definitions: ActionDefinitions;

  constructor(definitions: ActionDefinitions) {
    for (const intent of ACTION_INTENTS) {
      const definition = definitions[intent];
      Object.freeze(definition.requiredSlots);
      Object.freeze(definition.optionalSlots);
      Object.freeze(definition);
    }
    this.definitions = Object.freeze({ ...definitions });
  }

  /**
   * @throws UnrecognizedIntentError for labels outside the catalog
   */
  lookup(intent: string): ActionDefinition {
    if (!isActionIntent(intent)) {
      throw new UnrecognizedIntentError(intent, `No action is defined for intent "${intent}"`);
    }
    return this.definitions[intent];
  }

  get(intent: ActionIntent): ActionDefinition {
    return this.definitions[intent];
  }

  /**
   * Descriptions in catalog order, for help replies
   */
  describeActions(): string[] {
    return ACTION_INTENTS.map((intent) => this.definitions[intent].description);
  }
}
