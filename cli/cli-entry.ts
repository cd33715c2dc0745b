/**
 * Main entry point for the rpyfmt CLI application.
 */
/// <reference types="node" />
import { main } from './index';

// Export the main function for programmatic use
export { main };

void (async () => {
  try {
    const code = await main(process.argv.slice(2));
    // Engine subprocesses are gone by now; exit without waiting on stdin handles
    process.exit(code);
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
})();
