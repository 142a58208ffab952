import { existsSync } from 'node:fs';
import path from 'node:path';
import { createJiti } from 'jiti';
import { z } from 'zod';
import {
  serializeMessage,
  type AgentMessage,
  type AgentSaveMessage,
  type DispatchMessage,
  type MessageHandler,
  type RegistryHandlers,
  type RegistryMessage,
  type ScannerMessage,
  type ScannerSaveMessage,
} from '@chainfeed/registry';

function handlerSchema<T>() {
  return z.custom<T>((value) => typeof value === 'function', { message: 'Expected a function' }).optional();
}

const handlersSchema = z.object({
  saveAgent: handlerSchema<MessageHandler<AgentSaveMessage>>(),
  agentAction: handlerSchema<MessageHandler<AgentMessage>>(),
  saveScanner: handlerSchema<MessageHandler<ScannerSaveMessage>>(),
  scannerAction: handlerSchema<MessageHandler<ScannerMessage>>(),
  dispatch: handlerSchema<MessageHandler<DispatchMessage>>(),
  afterBlock: handlerSchema<NonNullable<RegistryHandlers['afterBlock']>>(),
});

/**
 * Pick the handlers out of a loaded module.
 * Supports a named `handlers` export and a default export.
 */
function pickHandlersExport(module: unknown): unknown {
  if (typeof module === 'object' && module !== null) {
    if ('handlers' in module) return module.handlers;
    if ('default' in module && module.default !== undefined) return module.default;
  }
  return module;
}

/**
 * Load a handler module (TypeScript or JavaScript) and validate its shape
 */
export async function loadHandlers(modulePath: string, cwd: string = process.cwd()): Promise<RegistryHandlers> {
  const filePath = path.resolve(cwd, modulePath);
  if (!existsSync(filePath)) {
    throw new Error(`Handler module not found: ${filePath}`);
  }

  const jiti = createJiti(import.meta.url, {
    interopDefault: true,
    moduleCache: false,
  });
  const module = await jiti.import(filePath);

  const result = handlersSchema.safeParse(pickHandlersExport(module));
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : 'handlers'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid handler module ${filePath}:\n${errors}`);
  }
  return result.data;
}

/**
 * Handlers that write every message as one JSON line
 */
export function printingHandlers(write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)): RegistryHandlers {
  const print = (message: RegistryMessage) => write(serializeMessage(message));
  return {
    saveAgent: print,
    agentAction: print,
    saveScanner: print,
    scannerAction: print,
    dispatch: print,
  };
}
