/**
 * Engine registry
 *
 * Backends are known at compile time and selected by name. Each call
 * creates a fresh engine; nothing is shared between callers.
 */

import { IllegalArgumentError } from "../errors.js";
import { EcmaScriptEngine } from "./ecmascript/engine.js";
import { Re2Engine } from "./re2/engine.js";
import type { RegexEngine } from "./types.js";

const ENGINES = {
  ecmascript: () => new EcmaScriptEngine(),
  re2: () => new Re2Engine(),
} satisfies Record<string, () => RegexEngine>;

export type EngineName = keyof typeof ENGINES;

function isEngineName(name: string): name is EngineName {
  return Object.hasOwn(ENGINES, name);
}

/**
 * Get the names of all available engine backends.
 */
export function getEngineNames(): EngineName[] {
  return Object.keys(ENGINES).filter(isEngineName);
}

/**
 * Create an engine backend by name.
 */
export function createEngine(name: string = "ecmascript"): RegexEngine {
  if (!isEngineName(name)) {
    throw new IllegalArgumentError(
      `Unknown regex engine: ${name} (available: ${getEngineNames().join(", ")})`,
    );
  }
  return ENGINES[name]();
}
