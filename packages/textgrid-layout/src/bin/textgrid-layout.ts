/**
 * CLI Binary Entry Point
 *
 * CLI mode is enabled before the CLI module loads so that no debug line
 * reaches stdout ahead of the JSON output.
 */

import { enableCliMode } from '../utils/debug';

enableCliMode();

// Dynamic import keeps enableCliMode() ahead of the CLI's own imports
import('../cli').catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
