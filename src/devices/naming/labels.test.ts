/**
 * Device Label Tests
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  formatAmdLabel,
  ordinalLabel,
  simplifyAmdName,
  simplifyPciSlot,
  uniqueLabels,
} from './labels.js';
import { pciSlotArbitrary } from '../test-setup.js';

describe('Device Labels', () => {
  describe('simplifyAmdName', () => {
    it('should shorten known Instinct names', () => {
      expect(simplifyAmdName('AMD Instinct MI300X')).toBe('MI300X');
      expect(simplifyAmdName('AMD Instinct MI250X / MI250')).toBe('MI250');
      expect(simplifyAmdName('AMD Instinct MI250X/MI250')).toBe('MI250');
      expect(simplifyAmdName('  AMD MI210 ')).toBe('MI210');
      expect(simplifyAmdName('AMD Instinct MI325X')).toBe('MI325X');
    });

    it('should leave other names untouched', () => {
      expect(simplifyAmdName('AMD Radeon RX 7900 XTX')).toBe('AMD Radeon RX 7900 XTX');
    });
  });

  describe('simplifyPciSlot', () => {
    it('should strip the domain prefix and function suffix', () => {
      expect(simplifyPciSlot('0000:2f:00.0')).toBe('2f');
      expect(simplifyPciSlot('0000:03:00.1')).toBe('03:00.1');
      expect(simplifyPciSlot('0001:2f:00.0')).toBe('0001:2f');
      expect(simplifyPciSlot('  ')).toBe('');
    });
  });

  describe('formatAmdLabel', () => {
    it('should combine model and slot', () => {
      expect(formatAmdLabel('AMD Instinct MI300X', '0000:2f:00.0', 'card1')).toBe('MI300X.2f');
    });

    it('should use the model alone when the slot is unknown', () => {
      expect(formatAmdLabel('AMD Radeon Pro W7900', '', 'card0')).toBe('AMD Radeon Pro W7900');
    });

    it('should fall back to the card name when no model resolved', () => {
      expect(formatAmdLabel(undefined, '0000:2f:00.0', 'card1')).toBe('AMD.card1');
      expect(formatAmdLabel('AMD', '0000:2f:00.0', 'card1')).toBe('AMD.card1');
      expect(formatAmdLabel('  ', '', 'card3')).toBe('AMD.card3');
    });

    it('should be deterministic for any name and slot', () => {
      fc.assert(fc.property(fc.string(), pciSlotArbitrary, (name, slot) => {
        expect(formatAmdLabel(name, slot, 'card0')).toBe(formatAmdLabel(name, slot, 'card0'));
      }));
    });
  });

  describe('ordinalLabel', () => {
    it('should append the enumeration index', () => {
      expect(ordinalLabel('Apple M2 Pro', 0)).toBe('Apple M2 Pro.0');
    });
  });

  describe('uniqueLabels', () => {
    it('should suffix repeated labels', () => {
      expect(uniqueLabels(['MI300X.2f', 'AMD.card1', 'MI300X.2f', 'MI300X.2f'])).toEqual([
        'MI300X.2f',
        'AMD.card1',
        'MI300X.2f#2',
        'MI300X.2f#3',
      ]);
    });

    it('should never emit duplicates', () => {
      fc.assert(fc.property(fc.array(fc.constantFrom('a', 'b', 'a#2', 'b#2')), (labels) => {
        const unique = uniqueLabels(labels);
        expect(new Set(unique).size).toBe(labels.length);
      }));
    });
  });
});
