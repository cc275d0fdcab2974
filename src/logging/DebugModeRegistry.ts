/**
 * Per-component level overrides.
 *
 * Components announce themselves when their module loads ("transport",
 * "storage.rsync", ...). FERRY_DEBUG_COMPONENTS lifts single components to
 * DEBUG or TRACE while the global level stays where it is.
 */

import { LogLevel, matchLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

interface ComponentEntry {
  description: string;
  override?: LogLevel;
}

export interface ComponentStatus {
  name: string;
  description: string;
  effectiveLevel: LogLevel;
  hasOverride: boolean;
}

const components = new Map<string, ComponentEntry>();

/** Entries look like "transport" or "storage.rsync:TRACE". */
const ENTRY_PATTERN = /^(.+):([A-Za-z]+)$/;

export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  components.set(name, defaultLevel === undefined ? { description } : { description, override: defaultLevel });
}

/**
 * Override one component's level. A name nobody registered gets itself as description.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  const entry = components.get(name) ?? { description: name };
  entry.override = level;
  components.set(name, entry);
}

export function clearComponentLevel(name: string): void {
  const entry = components.get(name);
  if (entry) {
    delete entry.override;
  }
}

export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  return components.get(name)?.override ?? globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

export function getRegisteredComponents(globalLevel: LogLevel): ComponentStatus[] {
  const statuses = Array.from(components, ([name, entry]): ComponentStatus => ({
    name,
    description: entry.description,
    effectiveLevel: entry.override ?? globalLevel,
    hasOverride: entry.override !== undefined,
  }));
  return statuses.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Apply the entries of FERRY_DEBUG_COMPONENTS. A missing or unknown level means DEBUG.
 */
export function initFromEnv(entries: readonly string[]): void {
  for (const entry of entries) {
    const match = ENTRY_PATTERN.exec(entry);
    const name = match?.[1] ?? entry;
    const level = match?.[2] === undefined ? undefined : matchLogLevel(match[2]);
    setComponentLevel(name, level ?? LogLevel.DEBUG);
  }
}

export function resetDebugRegistry(): void {
  components.clear();
}
