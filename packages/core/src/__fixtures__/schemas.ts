import type { OptionDescriptor } from '../types/options.js';

export const GAME = 'Test Game';

/** Toggle A plus choice B with labels x/y/z → codes 0/1/2 */
export const toggleAndChoice: OptionDescriptor[] = [
  { id: 'A', kind: 'toggle', default: 0 },
  {
    id: 'B',
    kind: 'choice',
    default: 1,
    choices: [
      { label: 'x', code: 0 },
      { label: 'y', code: 1 },
      { label: 'z', code: 2 },
    ],
  },
];

export const mixedOptions: OptionDescriptor[] = [
  { id: 'death_link', kind: 'toggle', default: 0 },
  { id: 'goal', kind: 'toggle', default: 1 },
  {
    id: 'difficulty',
    kind: 'choice',
    default: 1,
    choices: [
      { label: 'easy', code: 0 },
      { label: 'normal', code: 1 },
      { label: 'hard', code: 2 },
      { label: 'expert', code: 3 },
    ],
  },
  { id: 'shards', kind: 'range', default: 20, start: 10, end: 30 },
  {
    id: 'boss_count',
    kind: 'named-range',
    default: 3,
    start: 1,
    end: 5,
    specials: [
      { name: 'none', value: 0 },
      { name: 'all', value: 99 },
    ],
  },
  { id: 'player_name', kind: 'free-text', default: 'Player' },
  { id: 'palette', kind: 'text-choice', default: 'classic' },
  {
    id: 'starting_items',
    kind: 'choice',
    default: [0, 2],
    choices: [
      { label: 'none', code: 0 },
      { label: 'sword', code: 1 },
      { label: 'shield', code: 2 },
    ],
  },
];

export function toggles(count: number): OptionDescriptor[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `t${i}`,
    kind: 'toggle' as const,
    default: 0 as const,
  }));
}
