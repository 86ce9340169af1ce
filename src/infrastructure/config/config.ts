import { z } from 'zod';

/**
 * Environment booleans: only "true"/"1" enable, so REDIS_ENABLED=false really disables
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1'));

const configSchema = z.object({
  // Server
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  port: z.coerce.number().int().positive().default(3000),
  host: z.string().default('0.0.0.0'),

  // Slack
  slackBotToken: z.string().min(1),
  slackSigningSecret: z.string().min(1),
  slackBotUserId: z.string().min(1).optional(),
  slackApiBaseUrl: z.string().url().default('https://slack.com/api'),

  // ServiceNow
  servicenowInstanceUrl: z.string().url(),
  servicenowUsername: z.string().min(1),
  servicenowPassword: z.string().min(1),
  servicenowAssignmentGroup: z.string().min(1).optional(),
  backendTimeoutMs: z.coerce.number().int().positive().default(5000),

  // Intent classification
  intentGatewayUrl: z.string().url().optional(),
  intentGatewayTimeoutMs: z.coerce.number().int().positive().default(3000),
  intentConfidenceThreshold: z.coerce.number().min(0).max(1).default(0.6),
  interruptConfidenceThreshold: z.coerce.number().min(0).max(1).default(0.8),

  // Dialogue
  maxTurnsPerIntent: z.coerce.number().int().positive().default(5),
  sessionTtlSeconds: z.coerce.number().int().positive().default(15 * 60), // 15 minutes
  messageDedupeWindowSeconds: z.coerce.number().int().positive().default(5 * 60),

  // Redis
  redisUrl: z.string().url().optional(),
  redisEnabled: envBoolean(true),

  // Knowledge base
  knowledgeBaseSource: z.enum(['servicenow', 'local']).default('servicenow'),
  knowledgeBaseDir: z.string().default('./knowledge-base'),

  // Observability
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  serviceName: z.string().default('itops-chat-assistant'),

  // DevTools
  devToolsEnabled: envBoolean(false),
  devToolsToken: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Empty strings count as unset, so optional variables can be left blank in .env files
 */
function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    const config = {
      nodeEnv: readEnv(env, 'NODE_ENV'),
      port: readEnv(env, 'PORT'),
      host: readEnv(env, 'HOST'),
      slackBotToken: readEnv(env, 'SLACK_BOT_TOKEN'),
      slackSigningSecret: readEnv(env, 'SLACK_SIGNING_SECRET'),
      slackBotUserId: readEnv(env, 'SLACK_BOT_USER_ID'),
      slackApiBaseUrl: readEnv(env, 'SLACK_API_BASE_URL'),
      servicenowInstanceUrl: readEnv(env, 'SERVICENOW_INSTANCE_URL'),
      servicenowUsername: readEnv(env, 'SERVICENOW_USERNAME'),
      servicenowPassword: readEnv(env, 'SERVICENOW_PASSWORD'),
      servicenowAssignmentGroup: readEnv(env, 'SERVICENOW_ASSIGNMENT_GROUP'),
      backendTimeoutMs: readEnv(env, 'BACKEND_TIMEOUT_MS'),
      intentGatewayUrl: readEnv(env, 'INTENT_GATEWAY_URL'),
      intentGatewayTimeoutMs: readEnv(env, 'INTENT_GATEWAY_TIMEOUT_MS'),
      intentConfidenceThreshold: readEnv(env, 'INTENT_CONFIDENCE_THRESHOLD'),
      interruptConfidenceThreshold: readEnv(env, 'INTERRUPT_CONFIDENCE_THRESHOLD'),
      maxTurnsPerIntent: readEnv(env, 'MAX_TURNS_PER_INTENT'),
      sessionTtlSeconds: readEnv(env, 'SESSION_TTL_SECONDS'),
      messageDedupeWindowSeconds: readEnv(env, 'MESSAGE_DEDUPE_WINDOW_SECONDS'),
      redisUrl: readEnv(env, 'REDIS_URL'),
      redisEnabled: readEnv(env, 'REDIS_ENABLED'),
      knowledgeBaseSource: readEnv(env, 'KNOWLEDGE_BASE_SOURCE'),
      knowledgeBaseDir: readEnv(env, 'KNOWLEDGE_BASE_DIR'),
      logLevel: readEnv(env, 'LOG_LEVEL'),
      serviceName: readEnv(env, 'SERVICE_NAME'),
      devToolsEnabled: readEnv(env, 'DEVTOOLS_ENABLED'),
      devToolsToken: readEnv(env, 'DEVTOOLS_TOKEN'),
    };

    return configSchema.parse(config);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalidVars = error.errors.map((e) => e.path.map(String).join('.')).join(', ');
      throw new Error(`Invalid configuration. Missing or invalid variables: ${invalidVars}`);
    }
    throw error;
  }
}
