import { ReviewCommand } from './types.js';

const commands: Record<string, ReviewCommand> = {
  a: { type: 'approve' },
  r: { type: 'reject' },
  s: { type: 'skip' },
  c: { type: 'comment' },
  q: { type: 'quit' },
  aa: { type: 'approve_all' },
  ra: { type: 'reject_all' }
};

export const reviewCommandHelp = [
  '[A]pprove  approve this fix',
  '[R]eject   reject this fix',
  '[S]kip     defer this fix to a later session',
  '[C]omment  add a comment',
  '[Q]uit     stop reviewing; remaining fixes stay pending',
  '[AA]       approve all remaining',
  '[RA]       reject all remaining'
].join('\n');

export function parseReviewCommand(input: string): ReviewCommand | null {
  const trimmed = input.trim().toLowerCase();

  if (trimmed.includes('\n') || !Object.hasOwn(commands, trimmed)) {
    return null;
  }

  return commands[trimmed] ?? null;
}
