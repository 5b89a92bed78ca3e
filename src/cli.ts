/**
 * Command line argument parsing
 */

// ============================================
// CLI Arguments
// ============================================

export interface CliArgs {
  command: 'serve' | 'migrate' | 'help';
  host?: string;
  port?: number;
}

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { command: 'serve' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === 'serve' || arg === 'migrate' || arg === 'help') {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      const port = parseInt(argv[++i] ?? '', 10);
      if (Number.isNaN(port)) {
        throw new Error('--port requires a number');
      }
      result.port = port;
    } else if (arg === '--host') {
      const host = argv[++i];
      if (!host) {
        throw new Error('--host requires a value');
      }
      result.host = host;
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}
