import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { getStringFlag } from '../parser.js';
import { isStale } from '../../engine/engine.js';
import { getLogger } from '../../observability/logger.js';
import { readResultFile } from '../../utils/json-file.js';

const staleCommand: Command = {
  name: 'stale',
  description: 'Check whether a stored result must be recomputed',
  usage: 'stale <result.json>',
  async run(ctx: CommandContext): Promise<number> {
    const logger = getLogger().child({ command: 'stale' });
    const resultPath = ctx.args.positionals[0] ?? getStringFlag(ctx.args, 'result');
    if (!resultPath) {
      ctx.output.error(`Missing result file. Usage: breathscore ${staleCommand.usage}`);
      return 1;
    }

    try {
      const result = readResultFile(resultPath, ctx.cwd);
      const stale = isStale(result, new Date());
      logger.debug('Checked result staleness', { id: result.id, stale });

      if (ctx.output.isJson) {
        ctx.output.json({ id: result.id, stale, expiresAt: result.expiresAt.toISOString() });
      } else if (stale) {
        ctx.output.warn(`Result ${result.id} expired at ${result.expiresAt.toISOString()}; recompute it`);
      } else {
        ctx.output.success(`Result ${result.id} is valid until ${result.expiresAt.toISOString()}`);
      }

      return stale ? 1 : 0;
    } catch (error) {
      logger.error('Stale command failed', { error: String(error) });
      ctx.output.error(`Failed to read result: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }
  },
};

registerCommand(staleCommand);

export default staleCommand;
