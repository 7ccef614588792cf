/**
 * Proxmox tag parsing unit tests
 */
import { describe, it, expect } from 'vitest';
import { TAG_IP, TAG_SKIP, getTagValue, hasTag, parseTags } from '../../../src/proxmox/tags.js';

describe('tags', () => {
  describe('parseTags', () => {
    it('should split on semicolons and trim entries', () => {
      expect([...parseTags('prod; dnsherpa-ip:10.0.0.5,10.0.0.6 ;web')]).toEqual([
        'prod',
        'dnsherpa-ip:10.0.0.5,10.0.0.6',
        'web',
      ]);
    });

    it('should drop empty entries', () => {
      expect(parseTags(';;a;').size).toBe(1);
      expect(parseTags(undefined).size).toBe(0);
      expect(parseTags('').size).toBe(0);
    });
  });

  describe('hasTag', () => {
    it('should match whole tags only', () => {
      const tags = parseTags('dnsherpa-skip;other');
      expect(hasTag(tags, TAG_SKIP)).toBe(true);
      expect(hasTag(parseTags('dnsherpa-skipped'), TAG_SKIP)).toBe(false);
    });
  });

  describe('getTagValue', () => {
    it('should return the value after the colon', () => {
      expect(getTagValue(parseTags('dnsherpa-ip:192.0.2.5'), TAG_IP)).toBe('192.0.2.5');
    });

    it('should return undefined when the tag is absent', () => {
      expect(getTagValue(parseTags('prod'), TAG_IP)).toBeUndefined();
    });

    it('should return an empty string for an empty value', () => {
      expect(getTagValue(parseTags('dnsherpa-ip:'), TAG_IP)).toBe('');
    });
  });
});
