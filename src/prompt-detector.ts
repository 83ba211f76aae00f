import stripAnsi from 'strip-ansi';

export const UNKNOWN_MODE = 'unknown';

export class PromptDetector {
  // Ordered: configuration sub-modes first, then privileged/user mode
  private static readonly MODE_PATTERNS: RegExp[] = [
    /[\r\n]([A-Za-z0-9_-]+\([a-z0-9-]+\)[#>])\s*$/, // SW1(config)#, SW1(config-if)#
    /[\r\n]([A-Za-z0-9_-]+[#>])\s*$/, // SW1#, SW1>
  ];

  private static readonly PROMPT_LINE = /^[A-Za-z0-9_-]+(\([a-z0-9-]+\))?[#>]$/;

  private static readonly END_OF_OUTPUT = /[\r\n]([A-Za-z0-9_-]+(\([a-z0-9-]+\))?[#>])\s*$/;

  private static readonly FALLBACK_LINES = 5;

  /**
   * Removes ANSI sequences and the backspace erasures devices print while
   * redrawing a line. Safe to apply more than once.
   */
  public static cleanOutput(text: string): string {
    return stripAnsi(text.replace(/ \u0008/g, '').replace(/\u0008/g, ''));
  }

  public static detectMode(output: string): string {
    if (!output) {
      return UNKNOWN_MODE;
    }

    const cleanOutput = PromptDetector.cleanOutput(output);

    for (const pattern of PromptDetector.MODE_PATTERNS) {
      const match = pattern.exec(cleanOutput);
      if (match) {
        return match[1].trim();
      }
    }

    // The prompt may not end the buffer when the device echoes trailing noise
    const lines = cleanOutput
      .split(/\r?\n|\r/)
      .map(line => line.trim())
      .filter(line => line.length > 0)
      .slice(-PromptDetector.FALLBACK_LINES);

    for (let i = lines.length - 1; i >= 0; i--) {
      if (PromptDetector.PROMPT_LINE.test(lines[i])) {
        return lines[i];
      }
    }

    return UNKNOWN_MODE;
  }

  /** True when the cleaned buffer ends on a prompt line, i.e. the command has finished. */
  public static endsWithPrompt(output: string): boolean {
    return PromptDetector.END_OF_OUTPUT.test(PromptDetector.cleanOutput(output));
  }

  public static isConfigMode(output: string, marker: string): boolean {
    return marker.length > 0 && output.includes(marker);
  }
}
