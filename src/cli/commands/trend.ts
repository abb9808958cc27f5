import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { riskCategoryLabel } from '../../engine/describe.js';
import { summarizeTrend, toHistoryEntry } from '../../engine/trend.js';
import { getLogger } from '../../observability/logger.js';
import { readResultFile } from '../../utils/json-file.js';

const trendCommand: Command = {
  name: 'trend',
  description: 'Summarize the score trend across stored results',
  usage: 'trend <result.json> [<result.json> ...]',
  async run(ctx: CommandContext): Promise<number> {
    const logger = getLogger().child({ command: 'trend' });
    if (ctx.args.positionals.length === 0) {
      ctx.output.error(`No result files given. Usage: breathscore ${trendCommand.usage}`);
      return 1;
    }

    try {
      const entries = ctx.args.positionals.map(file => toHistoryEntry(readResultFile(file, ctx.cwd)));
      const summary = summarizeTrend(entries);
      if (!summary) {
        ctx.output.error('No results to summarize');
        return 1;
      }
      logger.debug('Trend summarized', { count: summary.count, direction: summary.direction });

      if (ctx.output.isJson) {
        ctx.output.json({
          ...summary,
          from: summary.from.toISOString(),
          to: summary.to.toISOString(),
        });
        return 0;
      }

      const sign = summary.change > 0 ? '+' : '';
      ctx.output.log(`Results: ${summary.count} (${summary.from.toISOString()} .. ${summary.to.toISOString()})`);
      ctx.output.log(`Overall: ${summary.firstScore} -> ${summary.latestScore} (${sign}${summary.change}, ${summary.direction})`);
      ctx.output.log(`Range: ${summary.minScore}-${summary.maxScore}, average ${summary.averageScore}`);
      ctx.output.log(`Latest risk: ${ctx.output.category(summary.latestCategory, riskCategoryLabel(summary.latestCategory))}`);
      return 0;
    } catch (error) {
      logger.error('Trend command failed', { error: String(error) });
      ctx.output.error(`Failed to summarize trend: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }
  },
};

registerCommand(trendCommand);

export default trendCommand;
