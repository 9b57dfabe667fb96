#!/usr/bin/env node

import { main } from './cli';

/**
 * `joule-uninstall [options]` is `joule-installer uninstall [options]`
 */
async function uninstall(): Promise<number> {
  const [node, script, ...args] = process.argv;
  return main([node, script, 'uninstall', ...args]);
}

// Only run if this file is executed directly
if (require.main === module) {
  uninstall()
    .then(code => process.exit(code))
    .catch((error: unknown) => {
      console.error('❌ Uninstallation failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}

export { uninstall };
