/**
 * User-facing texts shared by the engine, the router and the handlers
 */

export const BACKEND_UNAVAILABLE_REPLY =
  "I'm sorry, I couldn't reach the IT systems right now. Please try again later.";

export const CLASSIFIER_UNAVAILABLE_REPLY =
  "I'm having trouble understanding requests right now. Please try again in a moment.";

export const ENGINE_UNAVAILABLE_REPLY = 'Something went wrong on my side. Please try again in a moment.';

export const MULTI_TURN_UNAVAILABLE_REPLY =
  'I can\'t keep track of multi-step requests right now. Please send your whole request in one message, for example "status of INC12345".';

export const HANDOFF_REPLY =
  "I'm having trouble completing this request. Let me connect you to a human agent from the IT service desk.";

export const CANCELLED_REPLY = "Okay, I've cancelled that request. Is there anything else I can help with?";

export const NOTHING_TO_CANCEL_REPLY = "There's nothing to cancel right now. How can I help?";

/**
 * "a", "a or b", "a, b or c"
 */
export function joinList(items: readonly string[]): string {
  if (items.length <= 1) {
    return items.join('');
  }
  return `${items.slice(0, -1).join(', ')} or ${items[items.length - 1]}`;
}

export function capabilitiesSentence(descriptions: readonly string[]): string {
  return `I can ${joinList(descriptions)}.`;
}

export function clarificationReply(descriptions: readonly string[]): string {
  return `I'm not sure I understood that. ${capabilitiesSentence(descriptions)} Could you rephrase your request?`;
}

export function noMatchReply(descriptions: readonly string[]): string {
  return `Sorry, I didn't understand that. ${capabilitiesSentence(descriptions)}`;
}

export function greetingReply(descriptions: readonly string[]): string {
  return `Hello! I'm your IT support assistant. ${capabilitiesSentence(descriptions)} How can I help you today?`;
}

export function helpReply(descriptions: readonly string[]): string {
  return `${capabilitiesSentence(descriptions)} Just tell me what you need.`;
}

export function repromptReply(validationMessage: string, prompt: string): string {
  return `${validationMessage} ${prompt}`;
}
