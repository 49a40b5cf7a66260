/**
 * Rendering utilities for terminal output
 * Handles prediction tables, model info, welcome banner
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import boxen from 'boxen';
import type { BatchResult, ModelInfo, PredictionResult } from '../ml/types.js';
import { formatBar, formatNumber, formatPercent, formatValue, truncate } from './format.js';

/**
 * Render welcome banner when no args provided
 */
export function renderWelcomeBanner(): string {
  const title = chalk.cyan.bold('roomsense');
  const tagline = chalk.gray('Activity classification for patient-room sensor readings');

  const examples = [
    chalk.white('Examples:'),
    '  ' + chalk.cyan('roomsense predict') + ' --temperature 23.5 --motion 45 --sound 120',
    '  ' + chalk.cyan('roomsense predict') + ' ./reading.json --json',
    '  ' + chalk.cyan('roomsense batch') + ' ./readings.jsonl',
    '  ' + chalk.cyan('roomsense fhir') + ' ./observation.json',
    '  ' + chalk.cyan('roomsense info') + '                ' + chalk.gray('# Model metadata and classes'),
    '  ' + chalk.cyan('roomsense mcp') + '                 ' + chalk.gray('# Serve tools over stdio'),
  ];

  const help = chalk.gray('\nRun') + ' ' + chalk.cyan('roomsense --help') + ' ' + chalk.gray('for all options');

  return boxen(
    `${title}\n${tagline}\n\n${examples.join('\n')}${help}`,
    {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'cyan',
    }
  );
}

function confidenceColor(confidence: number): (text: string) => string {
  if (confidence >= 0.7) return chalk.green;
  if (confidence >= 0.4) return chalk.yellow;
  return chalk.red;
}

/**
 * Render a single prediction with its full distribution
 */
export function renderPrediction(result: PredictionResult, filledDefaults: readonly string[] = []): string {
  const color = confidenceColor(result.confidence);
  const lines = [
    chalk.bold('Activity: ') + color(chalk.bold(result.activityClass)),
    chalk.bold('Confidence: ') + color(formatPercent(result.confidence)),
    '',
  ];

  const table = new Table({
    head: [chalk.bold('Class'), chalk.bold('Probability'), ''],
    style: { head: [], border: ['gray'] },
  });

  const ranked = Object.entries(result.confidenceScores).sort(([, a], [, b]) => b - a);
  for (const [label, probability] of ranked) {
    const isPredicted = label === result.activityClass;
    table.push([
      isPredicted ? chalk.cyan(label) : label,
      formatPercent(probability),
      chalk.gray(formatBar(probability)),
    ]);
  }
  lines.push(table.toString());

  if (filledDefaults.length > 0) {
    lines.push('', chalk.yellow(`Defaulted to 0: ${filledDefaults.join(', ')}`));
  }

  return lines.join('\n');
}

/**
 * Render batch results in input order
 */
export function renderBatch(results: readonly BatchResult[]): string {
  if (results.length === 0) {
    return chalk.yellow('No readings in batch');
  }

  const table = new Table({
    head: [chalk.bold('#'), chalk.bold('Activity'), chalk.bold('Confidence')],
    style: { head: [], border: ['gray'] },
  });

  for (const result of results) {
    table.push([
      chalk.gray(result.index.toString()),
      truncate(result.activityClass, 30),
      confidenceColor(result.confidence)(formatPercent(result.confidence)),
    ]);
  }

  const counts = new Map<string, number>();
  for (const result of results) {
    counts.set(result.activityClass, (counts.get(result.activityClass) ?? 0) + 1);
  }
  const summary = [...counts.entries()]
    .sort(([, a], [, b]) => b - a)
    .map(([label, count]) => `${label}: ${formatNumber(count)}`)
    .join(', ');

  return `${table.toString()}\n${chalk.gray(`${formatNumber(results.length)} readings (${summary})`)}`;
}

/**
 * Render the feature vector a reading turned into
 */
export function renderFeatures(features: readonly string[], vector: readonly number[]): string {
  return features
    .map((name, i) => `  ${chalk.gray(name.padEnd(14))} ${formatValue(vector[i])}`)
    .join('\n');
}

/**
 * Render model metadata, classes and feature order
 */
export function renderModelInfo(info: ModelInfo): string {
  const lines = [
    chalk.bold.cyan('Model'),
    ...Object.entries(info.metadata)
      .filter(([, value]) => typeof value !== 'object' || value === null)
      .map(([key, value]) => `  ${key}: ${chalk.gray(String(value))}`),
    '',
    chalk.bold('Classes'),
    ...info.classes.map((label, i) => `  ${chalk.gray(i.toString())} ${label}`),
    '',
    chalk.bold('Features'),
    ...info.features.map((name, i) => `  ${chalk.gray(i.toString())} ${name}`),
  ];
  return lines.join('\n');
}

/**
 * Output as JSON (for --json mode)
 */
export function outputJSON(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Create a divider line
 */
export function divider(char: string = '─', length: number = 60): string {
  return chalk.gray(char.repeat(length));
}
