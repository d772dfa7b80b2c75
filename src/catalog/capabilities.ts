/**
 * Capabilities
 *
 * In-process services the orchestrator can call directly (translation of
 * user-facing messages, text extraction). Each capability has its own
 * interface and a typed key, so a lookup hands back the right interface.
 *
 * @module agent-orchestrator/catalog/capabilities
 */

import { CAPABILITY_KEYS, type CapabilityKey, type ExecutionContext } from './types.js';

export interface Translator {
  translate(text: string, context: ExecutionContext): Promise<string>;
}

export interface TextExtractor {
  extractText(imagePath: string, context?: ExecutionContext): Promise<string>;
}

/**
 * Capability key -> interface
 */
export interface CapabilityMap {
  translator: Translator;
  textExtractor: TextExtractor;
}

/**
 * Typed registry of capability implementations
 *
 * @example
 * ```typescript
 * const capabilities = new CapabilityRegistry();
 * capabilities.register('translator', myTranslator);
 *
 * const translator = capabilities.get('translator'); // Translator | undefined
 * ```
 */
export class CapabilityRegistry {
  private capabilities: Partial<CapabilityMap> = {};

  /**
   * @throws Error if the capability already has an implementation
   */
  register<K extends CapabilityKey>(key: K, implementation: CapabilityMap[K]): void {
    if (this.capabilities[key] !== undefined) {
      throw new Error(`Capability '${key}' is already registered`);
    }
    this.capabilities[key] = implementation;
  }

  get<K extends CapabilityKey>(key: K): CapabilityMap[K] | undefined {
    return this.capabilities[key];
  }

  has(key: CapabilityKey): boolean {
    return this.capabilities[key] !== undefined;
  }

  unregister(key: CapabilityKey): boolean {
    const existed = this.has(key);
    delete this.capabilities[key];
    return existed;
  }

  /** Keys with a registered implementation */
  keys(): CapabilityKey[] {
    const keys: CapabilityKey[] = [];
    for (const key of CAPABILITY_KEYS) {
      if (this.has(key)) keys.push(key);
    }
    return keys;
  }

  clear(): void {
    this.capabilities = {};
  }
}
