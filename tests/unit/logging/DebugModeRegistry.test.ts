import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  shouldLog,
  getRegisteredComponents,
  initFromEnv,
  resetDebugRegistry,
} from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

describe('DebugModeRegistry', () => {
  beforeEach(() => {
    resetDebugRegistry();
  });

  describe('registerComponent', () => {
    it('should register a component', () => {
      registerComponent('smtp', 'SMTP STARTTLS sender');
      const components = getRegisteredComponents(LogLevel.INFO);
      expect(components).toEqual([
        { name: 'smtp', description: 'SMTP STARTTLS sender', effectiveLevel: LogLevel.INFO, hasOverride: false },
      ]);
    });

    it('should register with a default level override', () => {
      registerComponent('smtp', 'SMTP', LogLevel.DEBUG);
      const components = getRegisteredComponents(LogLevel.INFO);
      expect(components[0]?.effectiveLevel).toBe(LogLevel.DEBUG);
      expect(components[0]?.hasOverride).toBe(true);
    });

    it('should overwrite the description of an existing registration', () => {
      registerComponent('smtp', 'Old desc');
      registerComponent('smtp', 'New desc');
      const components = getRegisteredComponents(LogLevel.INFO);
      expect(components).toHaveLength(1);
      expect(components[0]?.description).toBe('New desc');
    });

    it('should keep an override applied before registration', () => {
      initFromEnv(['smtp:TRACE']);
      registerComponent('smtp', 'SMTP STARTTLS sender');
      expect(getEffectiveLevel('smtp', LogLevel.INFO)).toBe(LogLevel.TRACE);
    });
  });

  describe('setComponentLevel / clearComponentLevel', () => {
    it('should set and clear an override', () => {
      registerComponent('enquiry', 'Enquiries');
      setComponentLevel('enquiry', LogLevel.TRACE);
      expect(getEffectiveLevel('enquiry', LogLevel.INFO)).toBe(LogLevel.TRACE);

      clearComponentLevel('enquiry');
      expect(getEffectiveLevel('enquiry', LogLevel.INFO)).toBe(LogLevel.INFO);
    });

    it('should auto-register an unknown component', () => {
      setComponentLevel('api', LogLevel.DEBUG);
      const components = getRegisteredComponents(LogLevel.INFO);
      expect(components.map((c) => c.name)).toEqual(['api']);
    });

    it('should ignore clearing an unregistered component', () => {
      clearComponentLevel('nonexistent');
      expect(getEffectiveLevel('nonexistent', LogLevel.INFO)).toBe(LogLevel.INFO);
    });
  });

  describe('getEffectiveLevel', () => {
    it('should return the global level without an override', () => {
      expect(getEffectiveLevel('smtp', LogLevel.WARN)).toBe(LogLevel.WARN);
    });

    it('should fall back to the parent of a dotted name', () => {
      setComponentLevel('smtp', LogLevel.TRACE);
      expect(getEffectiveLevel('smtp.session', LogLevel.INFO)).toBe(LogLevel.TRACE);
    });

    it('should prefer the nearest override', () => {
      setComponentLevel('smtp', LogLevel.TRACE);
      setComponentLevel('smtp.session', LogLevel.ERROR);
      expect(getEffectiveLevel('smtp.session', LogLevel.INFO)).toBe(LogLevel.ERROR);
    });
  });

  describe('shouldLog', () => {
    it('should compare against the global level', () => {
      expect(shouldLog('smtp', LogLevel.ERROR, LogLevel.INFO)).toBe(true);
      expect(shouldLog('smtp', LogLevel.INFO, LogLevel.INFO)).toBe(true);
      expect(shouldLog('smtp', LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
    });

    it('should compare against a component override', () => {
      setComponentLevel('smtp', LogLevel.TRACE);
      expect(shouldLog('smtp', LogLevel.TRACE, LogLevel.ERROR)).toBe(true);

      setComponentLevel('smtp', LogLevel.WARN);
      expect(shouldLog('smtp', LogLevel.INFO, LogLevel.DEBUG)).toBe(false);
    });
  });

  describe('getRegisteredComponents', () => {
    it('should return components sorted by name', () => {
      registerComponent('smtp', 'S');
      registerComponent('api', 'A');
      registerComponent('enquiry', 'E');
      expect(getRegisteredComponents(LogLevel.INFO).map((c) => c.name)).toEqual(['api', 'enquiry', 'smtp']);
    });
  });

  describe('initFromEnv', () => {
    it('should parse plain names and name:LEVEL entries', () => {
      initFromEnv(['smtp:TRACE', 'enquiry', 'api:warn']);
      expect(getEffectiveLevel('smtp', LogLevel.INFO)).toBe(LogLevel.TRACE);
      expect(getEffectiveLevel('enquiry', LogLevel.INFO)).toBe(LogLevel.DEBUG);
      expect(getEffectiveLevel('api', LogLevel.INFO)).toBe(LogLevel.WARN);
    });

    it('should default to DEBUG for an unknown level suffix', () => {
      initFromEnv(['smtp:LOUD']);
      expect(getEffectiveLevel('smtp', LogLevel.INFO)).toBe(LogLevel.DEBUG);
    });

    it('should split on the last colon', () => {
      initFromEnv(['smtp.session:TRACE']);
      expect(getEffectiveLevel('smtp.session', LogLevel.INFO)).toBe(LogLevel.TRACE);
    });
  });

  describe('resetDebugRegistry', () => {
    it('should clear all registrations', () => {
      registerComponent('a', 'A');
      setComponentLevel('b', LogLevel.TRACE);
      resetDebugRegistry();
      expect(getRegisteredComponents(LogLevel.INFO)).toEqual([]);
    });
  });
});
