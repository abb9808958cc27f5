import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import type { Output } from '../output.js';
import { getNumberFlag, getStringFlag } from '../parser.js';
import { SCORE_FIELDS, detectScoreAlerts, partitionRecommendations, type ScoreAlert } from '../../engine/alerts.js';
import { allScorers } from '../../engine/components/index.js';
import {
  describeScore,
  healthStatus,
  personalizedTips,
  riskCategoryLabel,
  riskLevelDescription,
} from '../../engine/describe.js';
import { HealthScoreEngine } from '../../engine/engine.js';
import { serializeResult } from '../../engine/serialize.js';
import type { HealthRecommendation, HealthScoreResult } from '../../engine/types.js';
import { parseScoreRequest } from '../../input/request.js';
import { getLogger } from '../../observability/logger.js';
import { readJsonFile, readResultFile, writeJsonFile } from '../../utils/json-file.js';

const scoreCommand: Command = {
  name: 'score',
  description: 'Compute a health score from an exposure request file',
  usage: 'score --input <request.json> [--previous <result.json>] [--threshold N] [--out <result.json>]',
  async run(ctx: CommandContext): Promise<number> {
    const logger = getLogger().child({ command: 'score' });

    const inputPath = getStringFlag(ctx.args, 'input', 'i') ?? ctx.args.positionals[0];
    if (!inputPath) {
      ctx.output.error(`Missing --input. Usage: breathscore ${scoreCommand.usage}`);
      return 1;
    }

    // Config values are validated on load; only the flag needs checking here
    const thresholdFlag = getNumberFlag(ctx.args, 'threshold');
    if (thresholdFlag !== undefined && !(thresholdFlag >= 0 && thresholdFlag <= 100)) {
      ctx.output.error('--threshold must be a number between 0 and 100');
      return 1;
    }
    const threshold = thresholdFlag ?? ctx.config.scoreThreshold;

    const done = getLogger().time('Score command');
    try {
      const request = parseScoreRequest(readJsonFile(inputPath, ctx.cwd));
      logger.info('Computing health score', {
        userId: request.userId,
        historySamples: request.history?.length ?? 0,
      });

      const engine = new HealthScoreEngine({ logger });
      const result = engine.computeHealthScore(
        request.userId,
        request.userProfile,
        request.healthProfile,
        request.currentReading,
        request.history
      );

      const previousPath = getStringFlag(ctx.args, 'previous');
      const previous = previousPath ? readResultFile(previousPath, ctx.cwd) : undefined;
      const alerts = detectScoreAlerts(previous, result);

      const outPath = getStringFlag(ctx.args, 'out', 'o');
      if (outPath) {
        const written = writeJsonFile(outPath, ctx.cwd, serializeResult(result));
        logger.debug('Result written', { path: written });
      }

      if (ctx.output.isJson) {
        ctx.output.json({
          result: serializeResult(result),
          description: describeScore(result.overallScore),
          status: healthStatus(result.overallScore),
          riskDescription: riskLevelDescription(result.riskCategory),
          tips: personalizedTips(result),
          alerts,
        });
      } else {
        printResult(result, alerts, ctx.output);
      }
      done();

      if (result.overallScore < threshold) {
        logger.warn('Health score below threshold', { score: result.overallScore, threshold });
        return 1;
      }

      return 0;
    } catch (error) {
      logger.error('Score command failed', { error: String(error) });
      ctx.output.error(`Failed to compute health score: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }
  },
};

function formatAlert(alert: ScoreAlert): string {
  switch (alert.kind) {
    case 'score_drop':
      return `Score dropped by ${alert.drop} points to ${alert.overallScore}`;
    case 'risk_change':
      return `Risk changed from ${alert.from} to ${alert.to}`;
    case 'urgent_recommendation':
      return `Urgent: ${alert.title}`;
  }
}

function printRecommendations(heading: string, recommendations: HealthRecommendation[], output: Output): void {
  if (recommendations.length === 0) return;
  output.log(`${heading} (${recommendations.length}):`);
  for (const rec of recommendations) {
    output.log(`  - [${rec.priority}] ${rec.title}`);
    rec.actions.forEach(action => output.log(`      * ${action}`));
  }
  output.log('');
}

function printResult(result: HealthScoreResult, alerts: ScoreAlert[], output: Output): void {
  const label = output.category(result.riskCategory, riskCategoryLabel(result.riskCategory));
  output.log(`\nHealth Score: ${result.overallScore}/100 (${label})`);
  output.log(describeScore(result.overallScore));
  output.log(riskLevelDescription(result.riskCategory));
  output.log(`Risk level: ${result.riskLevel.toFixed(2)}\n`);

  const rows = allScorers.map(scorer => [scorer.name, String(result[SCORE_FIELDS[scorer.id]])]);
  output.log(output.table(['Component', 'Score'], rows));
  output.log('');

  const { urgent, general } = partitionRecommendations(result);
  printRecommendations('URGENT', urgent, output);
  printRecommendations('RECOMMENDATIONS', general, output);

  const tips = personalizedTips(result);
  if (tips.length > 0) {
    output.log('TIPS:');
    tips.forEach(tip => output.log(`  - ${tip}`));
    output.log('');
  }

  if (alerts.length > 0) {
    output.log(`ALERTS (${alerts.length}):`);
    alerts.forEach(alert => output.log(`  - ${formatAlert(alert)}`));
    output.log('');
  }

  output.log(`Valid until ${result.expiresAt.toISOString()}`);
}

registerCommand(scoreCommand);

export default scoreCommand;
