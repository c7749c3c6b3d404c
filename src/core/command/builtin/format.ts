import type { Actor, StreakEvent } from '../../streak/types.js';

const UNITS: Array<[label: string, ms: number]> = [
  ['天', 24 * 60 * 60 * 1000],
  ['小时', 60 * 60 * 1000],
  ['分', 60 * 1000],
  ['秒', 1000],
];

/**
 * 3723000 → "1小时 2分 3秒". Zero units are left out; under a second is "0秒".
 */
export function formatDuration(ms: number): string {
  let rest = Math.max(0, Math.floor(ms));
  const parts: string[] = [];
  for (const [label, size] of UNITS) {
    const amount = Math.floor(rest / size);
    rest -= amount * size;
    if (amount > 0) parts.push(`${amount}${label}`);
  }
  return parts.length > 0 ? parts.join(' ') : '0秒';
}

export function actorName(actor: Actor): string {
  return actor.displayName ?? actor.userId;
}

/** One line of /history */
export function describeEvent(event: StreakEvent): string {
  switch (event.kind) {
    case 'TRIGGER': {
      const { fragment, layer, ruleName } = event.details;
      return `触发「${fragment}」(${layer === 'LEMMA' ? '词形' : `规则 ${ruleName ?? '?'}`})`;
    }
    case 'MANUAL_RESET':
      return event.details.reason ? `手动重置：${event.details.reason}` : '手动重置';
    case 'UNDO':
      return `撤销 ${event.details.targetIds.map((id) => `#${id}`).join(', ')}`;
  }
}
