import { z } from 'zod';
import { MessageParseError } from '../errors.ts';
import type {
  AgentMessage,
  AgentSaveMessage,
  DispatchMessage,
  RegistryMessage,
  ScannerMessage,
  ScannerSaveMessage,
} from './types.ts';

// ============================================================================
// Field Schemas
// ============================================================================

const hexQuantitySchema = z.string().regex(/^0x[0-9a-fA-F]+$/, 'Invalid hex quantity');
const txHashSchema = z.string().regex(/^0x[0-9a-fA-F]{64}$/, 'Invalid transaction hash');
const addressSchema = z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'Invalid Ethereum address');

// ============================================================================
// Message Schemas
// ============================================================================

const agentSaveSchema = z.object({
  action: z.literal('SaveAgent'),
  agentId: hexQuantitySchema,
  txHash: txHashSchema,
  enabled: z.boolean(),
  name: z.string(),
  chainIds: z.array(z.number().int().nonnegative()),
  metadata: z.string(),
  owner: addressSchema,
});

const agentMessageSchema = z.object({
  action: z.enum(['EnableAgent', 'DisableAgent']),
  agentId: hexQuantitySchema,
  txHash: txHashSchema,
});

const scannerSaveSchema = z.object({
  action: z.literal('SaveScanner'),
  scannerId: hexQuantitySchema,
  txHash: txHashSchema,
  enabled: z.boolean(),
  chainId: z.number().int().nonnegative(),
  metadata: z.string(),
});

const scannerMessageSchema = z.object({
  action: z.enum(['EnableScanner', 'DisableScanner']),
  scannerId: hexQuantitySchema,
  txHash: txHashSchema,
});

const dispatchMessageSchema = z.object({
  action: z.enum(['Link', 'Unlink']),
  agentId: hexQuantitySchema,
  scannerId: hexQuantitySchema,
  txHash: txHashSchema,
});

const registryMessageSchema = z.discriminatedUnion('action', [
  agentSaveSchema,
  agentMessageSchema,
  scannerSaveSchema,
  scannerMessageSchema,
  dispatchMessageSchema,
]);

const actionTagSchema = z.object({ action: z.string() });

// ============================================================================
// Parsing
// ============================================================================

function decodeJson(data: string): unknown {
  try {
    return JSON.parse(data);
  } catch (error) {
    throw new MessageParseError(
      `invalid message JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * The action tag is checked before any kind-specific field
 */
function parseTagged<T>(
  kind: string,
  actions: readonly string[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: string
): T {
  const raw = decodeJson(data);

  const tag = actionTagSchema.safeParse(raw);
  if (!tag.success) {
    throw new MessageParseError(`missing action for ${kind}`);
  }
  if (!actions.includes(tag.data.action)) {
    throw new MessageParseError(`invalid action for ${kind}: ${tag.data.action}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new MessageParseError(`invalid ${kind}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseAgentSave(data: string): AgentSaveMessage {
  return parseTagged('AgentSave', ['SaveAgent'], agentSaveSchema, data);
}

export function parseAgentMessage(data: string): AgentMessage {
  return parseTagged('AgentMessage', agentMessageSchema.shape.action.options, agentMessageSchema, data);
}

export function parseScannerSave(data: string): ScannerSaveMessage {
  return parseTagged('ScannerSave', ['SaveScanner'], scannerSaveSchema, data);
}

export function parseScannerMessage(data: string): ScannerMessage {
  return parseTagged('ScannerMessage', scannerMessageSchema.shape.action.options, scannerMessageSchema, data);
}

export function parseDispatchMessage(data: string): DispatchMessage {
  return parseTagged('DispatchMessage', dispatchMessageSchema.shape.action.options, dispatchMessageSchema, data);
}

/**
 * Parse a message of any kind, selected by its action tag
 */
export function parseMessage(data: string): RegistryMessage {
  const raw = decodeJson(data);

  const tag = actionTagSchema.safeParse(raw);
  if (!tag.success) {
    throw new MessageParseError('missing action');
  }

  const result = registryMessageSchema.safeParse(raw);
  if (!result.success) {
    if (result.error.issues.some((issue) => issue.code === z.ZodIssueCode.invalid_union_discriminator)) {
      throw new MessageParseError(`unknown action: ${tag.data.action}`);
    }
    throw new MessageParseError(`invalid ${tag.data.action} message: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function serializeMessage(message: RegistryMessage): string {
  return JSON.stringify(message);
}
