import { describe, it, expect } from 'vitest';
import { formatCpu, formatMemory, parseResourceQuantity, toCanonical } from '../../src/analysis/quantity';

describe('quantity', () => {
  describe('parseResourceQuantity', () => {
    it('should parse CPU millicores', () => {
      expect(parseResourceQuantity('100m')).toBe(0.1);
      expect(parseResourceQuantity('500m')).toBe(0.5);
    });

    it('should parse CPU cores', () => {
      expect(parseResourceQuantity('1')).toBe(1);
      expect(parseResourceQuantity('2')).toBe(2);
      expect(parseResourceQuantity('0.5')).toBe(0.5);
    });

    it('should parse memory in binary and decimal units', () => {
      expect(parseResourceQuantity('128Mi')).toBe(128 * 1024 * 1024);
      expect(parseResourceQuantity('1Gi')).toBe(1024 * 1024 * 1024);
      expect(parseResourceQuantity('256Ki')).toBe(256 * 1024);
      expect(parseResourceQuantity('1G')).toBe(1e9);
      expect(parseResourceQuantity('500M')).toBe(5e8);
    });

    it('should parse exponent notation', () => {
      expect(parseResourceQuantity('1e3')).toBe(1000);
      expect(parseResourceQuantity('1E')).toBe(1e18);
    });

    it('should return null for malformed quantities', () => {
      expect(parseResourceQuantity('')).toBeNull();
      expect(parseResourceQuantity('abc')).toBeNull();
      expect(parseResourceQuantity('100mb')).toBeNull();
      expect(parseResourceQuantity('1.2.3')).toBeNull();
      expect(parseResourceQuantity('Mi')).toBeNull();
    });
  });

  describe('toCanonical', () => {
    it('should convert cores to millicores', () => {
      expect(toCanonical('cpu', 0.1)).toBe(100);
      expect(toCanonical('cpu', 1.1)).toBe(1100);
      expect(toCanonical('cpu', 0.0005)).toBe(0.5);
    });

    it('should round fractional bytes up', () => {
      expect(toCanonical('memory', 1536.5)).toBe(1537);
      expect(toCanonical('memory', 134217728)).toBe(134217728);
    });
  });

  describe('formatting', () => {
    it('should render CPU as millicores', () => {
      expect(formatCpu(100)).toBe('100m');
      expect(formatCpu(1000)).toBe('1000m');
      expect(formatCpu(0.5)).toBe('0.5m');
    });

    it('should render memory in the largest exact binary unit', () => {
      expect(formatMemory(1024 ** 3)).toBe('1Gi');
      expect(formatMemory(384 * 1024 * 1024)).toBe('384Mi');
      expect(formatMemory(1536)).toBe('1536');
      expect(formatMemory(2048)).toBe('2Ki');
      expect(formatMemory(0)).toBe('0');
    });
  });
});
