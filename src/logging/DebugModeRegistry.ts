/**
 * Per-component level overrides.
 *
 * Modules register a component name when they load ("smtp", "enquiry",
 * "api"). An operator can then raise one of them to DEBUG or TRACE, for
 * example to see an SMTP dialogue line by line, while the rest stays at
 * the global level. Dotted names ("smtp.session") inherit the nearest
 * registered ancestor's override.
 */

import { LogLevel, isLevelEnabled, tryParseLogLevel } from './LogLevel.js';

interface Component {
  description: string;
  override?: LogLevel;
}

export interface ComponentStatus {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

const components = new Map<string, Component>();

/**
 * Declare a component. Re-registering keeps an override set before it,
 * which is what happens when MAILER_DEBUG_COMPONENTS is applied first.
 */
export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const override = components.get(name)?.override ?? defaultLevel;
  components.set(name, { description, override });
}

/** Unknown names are registered on the fly. */
export function setComponentLevel(name: string, level: LogLevel): void {
  const component = components.get(name);
  if (component) {
    component.override = level;
    return;
  }
  components.set(name, { description: name, override: level });
}

export function clearComponentLevel(name: string): void {
  const component = components.get(name);
  if (component) {
    component.override = undefined;
  }
}

/**
 * Walk from `name` up through its dotted parents and return the first
 * override found, or `globalLevel`.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  for (let current = name; current.length > 0; ) {
    const override = components.get(current)?.override;
    if (override) {
      return override;
    }
    const dot = current.lastIndexOf('.');
    current = dot > 0 ? current.slice(0, dot) : '';
  }
  return globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return isLevelEnabled(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Registered components sorted by name.
 */
export function getRegisteredComponents(globalLevel: LogLevel): ComponentStatus[] {
  return [...components.entries()]
    .map(([name, { description, override }]) => ({
      name,
      description,
      effectiveLevel: override ?? globalLevel,
      hasOverride: override !== undefined,
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply MAILER_DEBUG_COMPONENTS entries: "smtp" means DEBUG, "smtp:TRACE"
 * sets that level. A suffix that is not a level name also means DEBUG.
 */
export function initFromEnv(entries: string[]): void {
  for (const entry of entries) {
    const colon = entry.lastIndexOf(':');
    if (colon <= 0) {
      setComponentLevel(entry, LogLevel.DEBUG);
      continue;
    }
    const level = tryParseLogLevel(entry.slice(colon + 1)) ?? LogLevel.DEBUG;
    setComponentLevel(entry.slice(0, colon), level);
  }
}

/** Test helper. */
export function resetDebugRegistry(): void {
  components.clear();
}
