// packages/core/src/translator/translator.ts — Natural-language step description → instruction text

import type { TranslationRule } from '../types/rules.js';
import type { Logger } from '../utils/logger.js';
import { isMacContext } from '../env/environment.js';
import { loadRules } from './rules.js';

export interface ActionTranslatorOptions {
  /** JSON rule file, re-read on every call. */
  rulesFile?: string | null;
  /** Set false to consult file rules only. */
  builtins?: boolean;
  logger?: Logger;
}

const LAUNCH_WORDS = ['open', 'launch', 'run'];

const QUOTED_PAYLOAD = /type\s+(["'])(.+?)\1/i;
const ARITHMETIC_PAYLOAD = /type\s+(\d+\s*[+\-*/]\s*\d+)/i;
const BARE_PAYLOAD = /type\s+(.+?)\s*(?:(?:and|then)\s+)?(?:press\s+)?enter\b/i;

function modifierKey(mac: boolean): string {
  return mac ? 'command' : 'win';
}

function typePayload(description: string): string | null {
  const quoted = QUOTED_PAYLOAD.exec(description);
  if (quoted) return quoted[2];
  const arithmetic = ARITHMETIC_PAYLOAD.exec(description);
  if (arithmetic) return arithmetic[1].replace(/\s+/g, '');
  const bare = BARE_PAYLOAD.exec(description);
  if (bare) {
    const payload = bare[1].trim();
    return payload.length > 0 ? payload : null;
  }
  return null;
}

function matchFileRules(rules: readonly TranslationRule[], text: string, mac: boolean): string | null {
  for (const rule of rules) {
    for (const pattern of rule.patterns) {
      if (!text.includes(pattern.toLowerCase())) continue;
      const template = mac && rule.macosInstruction ? rule.macosInstruction : rule.instruction;
      return template.replaceAll('{modifier}', modifierKey(mac)).trim();
    }
  }
  return null;
}

function matchBuiltins(description: string, text: string, mac: boolean): string | null {
  if (text.includes('calculator') && LAUNCH_WORDS.some((w) => text.includes(w))) {
    return mac
      ? 'hotkey command space; type "Calculator"; press enter'
      : 'hotkey win r; type "calc"; press enter';
  }

  if (text.includes('type') && text.includes('enter')) {
    const payload = typePayload(description);
    if (payload !== null) {
      return `type ${JSON.stringify(payload)}; press enter`;
    }
  }

  if (text.includes('type') && text.includes('hello world')) {
    return 'type "Hello World"';
  }

  return null;
}

/**
 * Ordered rule set: file rules first (first matching pattern wins), then built-ins.
 * Returns null when nothing matches so the caller can ask the reasoning engine.
 */
export class ActionTranslator {
  private readonly rulesFile: string | null;
  private readonly builtins: boolean;
  private readonly logger?: Logger;

  constructor(options: ActionTranslatorOptions = {}) {
    this.rulesFile = options.rulesFile ?? null;
    this.builtins = options.builtins ?? true;
    this.logger = options.logger;
  }

  translate(description: string, environment: string): string | null {
    const trimmed = description.trim();
    if (!trimmed) return null;
    const text = trimmed.toLowerCase();
    const mac = isMacContext(environment);

    const rules = loadRules(this.rulesFile, this.logger);
    const fromFile = matchFileRules(rules, text, mac);
    if (fromFile) {
      this.logger?.debug(`Rule file matched "${trimmed}"`);
      return fromFile;
    }

    return this.builtins ? matchBuiltins(trimmed, text, mac) : null;
  }
}
