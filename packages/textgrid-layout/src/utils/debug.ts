/**
 * Debug flag shared by the parsers and the placer.
 */

/**
 * Set by the CLI entry point so that debug lines never mix into JSON on stdout.
 */
let cliMode = false;

export function enableCliMode(): void {
  cliMode = true;
}

/**
 * True only when DEBUG=true is set and the CLI has not silenced output.
 *
 * @example
 * ```bash
 * DEBUG=true npx vitest run -t "vertical extension"
 * ```
 */
export function isDebugEnabled(): boolean {
  if (cliMode) return false;

  try {
    return typeof process !== 'undefined' &&
           typeof process.env !== 'undefined' &&
           process.env['DEBUG'] === 'true';
  } catch {
    // Accessing process can throw in sandboxed browser bundles
    return false;
  }
}
