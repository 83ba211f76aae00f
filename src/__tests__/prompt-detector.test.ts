import { describe, it, expect } from 'vitest';
import { PromptDetector, UNKNOWN_MODE } from '../prompt-detector.js';

describe('PromptDetector', () => {
  describe('detectMode', () => {
    it.each([
      ['show clock\r\n*10:00:00.000 UTC Mon Mar 1 2024\r\nSW1#', 'SW1#'],
      ['\r\nSW1>', 'SW1>'],
      ['configure terminal\r\nEnter configuration commands, one per line.\r\nSW1(config)#', 'SW1(config)#'],
      ['interface Gi0/1\r\nSW1(config-if)#', 'SW1(config-if)#'],
      ['router ospf 1\r\ncore_rtr-2(config-router)#', 'core_rtr-2(config-router)#'],
    ])('returns the trailing prompt of %j', (output, expected) => {
      expect(PromptDetector.detectMode(output)).toBe(expected);
    });

    it('ignores whitespace after the prompt', () => {
      expect(PromptDetector.detectMode('show version\r\nSW1# ')).toBe('SW1#');
    });

    it('recognizes a buffer that is only a prompt', () => {
      expect(PromptDetector.detectMode('SW1#')).toBe('SW1#');
      expect(PromptDetector.detectMode('SW1(config)#')).toBe('SW1(config)#');
    });

    it('strips backspace erasures before matching', () => {
      expect(PromptDetector.detectMode('\r\nSW1# \u0008')).toBe('SW1#');
      expect(PromptDetector.detectMode('\r\nSW1#\u0008\u0008')).toBe('SW1#');
    });

    it('strips ANSI colour codes before matching', () => {
      expect(PromptDetector.detectMode('\r\n\u001b[32mSW1#\u001b[0m')).toBe('SW1#');
    });

    it('falls back to a prompt line followed by trailing noise', () => {
      const output = 'show clock\r\nSW1#\r\n*Mar  1 10:00:00.000: %LINK-3-UPDOWN: Interface Gi0/1, changed state to up';
      expect(PromptDetector.detectMode(output)).toBe('SW1#');
    });

    it('returns unknown for empty output', () => {
      expect(PromptDetector.detectMode('')).toBe(UNKNOWN_MODE);
    });

    it('returns unknown when no prompt is among the last five lines', () => {
      const output = 'SW1#\r\nline1\r\nline2\r\nline3\r\nline4\r\nline5\r\n';
      expect(PromptDetector.detectMode(output)).toBe(UNKNOWN_MODE);
    });

    it('returns unknown for a prompt followed by typed input', () => {
      expect(PromptDetector.detectMode('SW1#show ip interface brief')).toBe(UNKNOWN_MODE);
    });

    it('returns unknown for a pager banner', () => {
      expect(PromptDetector.detectMode('interface Vlan1\r\n --More-- ')).toBe(UNKNOWN_MODE);
    });
  });

  describe('cleanOutput', () => {
    const samples = [
      'show run\r\nSW1# \u0008',
      '\u001b[1mSW1>\u001b[0m\u0008',
      'plain text with no control characters',
      'a \u0008 \u0008b',
      '\u001b\u0008[32mSW1#',
    ];

    it.each(samples)('is idempotent for %j', (sample) => {
      const once = PromptDetector.cleanOutput(sample);
      expect(PromptDetector.cleanOutput(once)).toBe(once);
      expect(PromptDetector.detectMode(once)).toBe(PromptDetector.detectMode(sample));
    });

    it('removes space-backspace pairs and lone backspaces', () => {
      expect(PromptDetector.cleanOutput('ab \u0008c\u0008d')).toBe('abcd');
    });

    it('removes an escape sequence split by a backspace in one pass', () => {
      expect(PromptDetector.cleanOutput('\u001b\u0008[32mSW1#')).toBe('SW1#');
    });
  });

  describe('endsWithPrompt', () => {
    it('is true when a prompt line ends the buffer', () => {
      expect(PromptDetector.endsWithPrompt('show version\r\nCisco IOS Software\r\n\r\nSW1#')).toBe(true);
      expect(PromptDetector.endsWithPrompt('interface Gi0/1\r\nSW1(config-if)# ')).toBe(true);
    });

    it('requires the prompt to start a line', () => {
      expect(PromptDetector.endsWithPrompt('SW1#')).toBe(false);
    });

    it('is false while output is still arriving', () => {
      expect(PromptDetector.endsWithPrompt('show running-config\r\nBuilding configuration...\r\n')).toBe(false);
    });
  });

  describe('isConfigMode', () => {
    it('looks for the configuration marker anywhere in the text', () => {
      expect(PromptDetector.isConfigMode('?\r\nSW1(config)#', '(config')).toBe(true);
      expect(PromptDetector.isConfigMode('?\r\nSW1#', '(config')).toBe(false);
    });

    it('never matches an empty marker', () => {
      expect(PromptDetector.isConfigMode('SW1(config)#', '')).toBe(false);
    });
  });
});
