import type { ActionIntent } from '../../domain/enums/intent-type.js';
import type { GatewayFailureReason } from '../ports/driven/gateway-result.js';

export type SlotValidation =
  | { kind: 'accepted'; value: string }
  | { kind: 'rejected'; message: string }
  /** explicit "no" to a confirmation: the user backs out of the intent */
  | { kind: 'declined' };

export type SlotValidator = (raw: string) => SlotValidation;

export type ResolvedSlots = Readonly<Record<string, string | undefined>>;

export interface SlotDefinition {
  readonly name: string;
  /** A function when the question names values collected earlier */
  readonly prompt: string | ((slots: ResolvedSlots) => string);
  readonly validate: SlotValidator;
  /**
   * Clears `reask` and asks for it again when the answer is declined.
   * Without it a decline cancels the intent.
   */
  readonly onDecline?: { readonly reask: string; readonly prompt: string };
}

export function renderPrompt(slot: SlotDefinition, slots: ResolvedSlots): string {
  return typeof slot.prompt === 'string' ? slot.prompt : slot.prompt(slots);
}

export interface HandlerContext {
  threadId: string;
  senderId: string;
  requestId: string;
  /** Stable per completed slot set; sent with creations so the backend can spot duplicates */
  correlationId: string;
}

export type ActionResult =
  | { status: 'success'; reply: string }
  | { status: 'failure'; reason: GatewayFailureReason; reply: string };

export interface ActionHandler {
  execute(slots: ResolvedSlots, context: HandlerContext): Promise<ActionResult>;
}

export interface ActionDefinition<I extends ActionIntent = ActionIntent> {
  readonly intent: I;
  /** Shown in help text, e.g. "reset your password" */
  readonly description: string;
  readonly requiredSlots: readonly SlotDefinition[];
  /** Filled from classifier entities only, never prompted */
  readonly optionalSlots: readonly SlotDefinition[];
  readonly handler: ActionHandler;
}

export type ActionDefinitions = { readonly [I in ActionIntent]: ActionDefinition<I> };

export type ActionHandlers = { readonly [I in ActionIntent]: ActionHandler };

/**
 * Reads a required slot. The engine only dispatches once every required slot is filled,
 * so a missing value is a catalog/handler mismatch.
 */
export function requireSlot(slots: ResolvedSlots, name: string): string {
  const value = slots[name];
  if (value === undefined) {
    throw new Error(`Slot "${name}" was not resolved`);
  }
  return value;
}
