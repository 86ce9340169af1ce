export interface IntentClassification {
  intent: string | null;
  entities: Record<string, string>;
  /** 0..1 */
  confidence: number;
}

export interface IntentGateway {
  classify(text: string, requestId: string): Promise<IntentClassification>;
}
