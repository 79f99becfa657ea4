/**
 * Console rendering of the hunt list, reward banner and item details
 */

import chalk from 'chalk';
import type { HuntItem, RewardTier } from '../types/hunt.js';
import { DISCOUNT_THRESHOLD } from '../state/store.js';

export interface HuntSummary {
  items: readonly Readonly<HuntItem>[];
  foundCount: number;
  totalCount: number;
  rewardTier: RewardTier;
}

export function formatBanner(tier: RewardTier, totalCount: number): string {
  switch (tier) {
    case 'grand-prize':
      return chalk.green(`🎉 All ${totalCount} found! You're entered into the $5,000 draw.`);
    case 'discount':
      return chalk.yellow(`🏷️  20% discount unlocked! (${DISCOUNT_THRESHOLD}+ items found)`);
    case 'none':
      return chalk.cyan(`Find ${DISCOUNT_THRESHOLD} for 20% off, find all ${totalCount} for the $5,000 draw!`);
  }
}

export function formatProgress(summary: Pick<HuntSummary, 'foundCount' | 'totalCount'>): string {
  return `Found ${summary.foundCount} of ${summary.totalCount}`;
}

export function formatTimestamp(date: Date, timeZone?: string): string {
  return date.toLocaleString('en-US', { dateStyle: 'medium', timeStyle: 'short', timeZone });
}

export function formatItemLines(item: Readonly<HuntItem>, index: number): string[] {
  const dot = item.found ? chalk.green('●') : chalk.gray('○');
  const position = String(index + 1).padStart(2);
  const check = item.found ? ` ${chalk.green('✓')}` : '';
  return [
    `${position}. ${dot} ${chalk.bold(item.title)}${check}`,
    `      ${chalk.dim(item.hint)}`,
  ];
}

export function formatList(summary: HuntSummary): string[] {
  const lines = [chalk.bold('City Scavenger Hunt'), formatBanner(summary.rewardTier, summary.totalCount), chalk.gray('─'.repeat(40))];
  summary.items.forEach((item, i) => {
    lines.push(...formatItemLines(item, i));
  });
  lines.push(chalk.gray('─'.repeat(40)));
  lines.push(chalk.dim(formatProgress(summary)));
  return lines;
}

export function formatDetail(item: Readonly<HuntItem>, timeZone?: string): string[] {
  const lines = [
    chalk.bold(item.title),
    item.hint,
    '',
    `Status: ${item.found ? chalk.green('found') : chalk.gray('not found')}`,
    `Photo:  ${item.photoData ? `${item.photoData.byteLength.toLocaleString('en-US')} bytes` : chalk.dim('No photo yet')}`,
  ];
  if (item.foundAt) {
    lines.push(chalk.dim(`Found: ${formatTimestamp(item.foundAt, timeZone)}`));
  }
  if (item.address) {
    lines.push(chalk.dim(`Address: ${item.address}`));
  }
  lines.push(chalk.dim(`id: ${item.id}`));
  return lines;
}

export function printList(summary: HuntSummary): void {
  console.log();
  for (const line of formatList(summary)) console.log(line);
  console.log();
}

export function printDetail(item: Readonly<HuntItem>): void {
  console.log();
  for (const line of formatDetail(item)) console.log(line);
  console.log();
}

export function printStatus(summary: HuntSummary): void {
  console.log(formatBanner(summary.rewardTier, summary.totalCount));
  console.log(chalk.dim(formatProgress(summary)));
}
