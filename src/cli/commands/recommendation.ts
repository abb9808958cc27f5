import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { getStringFlag } from '../parser.js';
import { completeRecommendation, dismissRecommendation } from '../../engine/feedback.js';
import { serializeResult } from '../../engine/serialize.js';
import { getLogger } from '../../observability/logger.js';
import { readResultFile, writeJsonFile } from '../../utils/json-file.js';

type RecommendationAction = 'dismiss' | 'complete';

const recommendationCommand: Command = {
  name: 'recommendation',
  description: 'Dismiss or complete a recommendation in a stored result',
  usage: 'recommendation <result.json> (--dismiss <id> | --complete <id>) [--out <result.json>]',
  async run(ctx: CommandContext): Promise<number> {
    const logger = getLogger().child({ command: 'recommendation' });
    const resultPath = ctx.args.positionals[0];
    if (!resultPath) {
      ctx.output.error(`Missing result file. Usage: breathscore ${recommendationCommand.usage}`);
      return 1;
    }

    const dismissId = getStringFlag(ctx.args, 'dismiss');
    const completeId = getStringFlag(ctx.args, 'complete');
    if ((dismissId === undefined) === (completeId === undefined)) {
      ctx.output.error('Pass exactly one of --dismiss <id> or --complete <id>');
      return 1;
    }
    const action: RecommendationAction = dismissId !== undefined ? 'dismiss' : 'complete';
    const recommendationId = dismissId ?? completeId ?? '';

    try {
      const result = readResultFile(resultPath, ctx.cwd);
      if (!result.recommendations.some(rec => rec.id === recommendationId)) {
        ctx.output.error(`Result ${result.id} has no recommendation ${recommendationId}`);
        return 1;
      }

      const updated =
        action === 'dismiss'
          ? dismissRecommendation(result, recommendationId)
          : completeRecommendation(result, recommendationId, new Date());

      const written = writeJsonFile(getStringFlag(ctx.args, 'out', 'o') ?? resultPath, ctx.cwd, serializeResult(updated));
      logger.debug('Recommendation updated', { id: result.id, recommendationId, action, path: written });

      if (ctx.output.isJson) {
        ctx.output.json({ id: result.id, recommendationId, action, remaining: updated.recommendations.length });
      } else {
        ctx.output.success(`${action === 'dismiss' ? 'Dismissed' : 'Completed'} ${recommendationId} in ${result.id}`);
      }
      return 0;
    } catch (error) {
      logger.error('Recommendation command failed', { error: String(error) });
      ctx.output.error(`Failed to update result: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }
  },
};

registerCommand(recommendationCommand);

export default recommendationCommand;
