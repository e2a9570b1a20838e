/**
 * Click Categories
 */

export type TimingClass = 'hard' | 'regular' | 'soft' | 'micro';

export type ClickCategory =
  | 'hardclick'
  | 'hardrelease'
  | 'click'
  | 'release'
  | 'softclick'
  | 'softrelease'
  | 'microclick'
  | 'microrelease';

/** Clickpack side folder. left/right are the platformer direction variants. */
export type PlayerSide = 'player1' | 'player2' | 'left1' | 'right1' | 'left2' | 'right2';

export const TIMING_CLASSES: readonly TimingClass[] = ['hard', 'regular', 'soft', 'micro'];

export const CLICK_CATEGORIES: readonly ClickCategory[] = [
  'hardclick',
  'hardrelease',
  'click',
  'release',
  'softclick',
  'softrelease',
  'microclick',
  'microrelease',
];

export const PLAYER_SIDES: readonly PlayerSide[] = [
  'player1',
  'player2',
  'left1',
  'right1',
  'left2',
  'right2',
];

const PRESS_CATEGORIES: Record<TimingClass, ClickCategory> = {
  hard: 'hardclick',
  regular: 'click',
  soft: 'softclick',
  micro: 'microclick',
};

const RELEASE_CATEGORIES: Record<TimingClass, ClickCategory> = {
  hard: 'hardrelease',
  regular: 'release',
  soft: 'softrelease',
  micro: 'microrelease',
};

export function categoryFor(timing: TimingClass, kind: 'press' | 'release'): ClickCategory {
  return kind === 'press' ? PRESS_CATEGORIES[timing] : RELEASE_CATEGORIES[timing];
}

/** Directory name of a category inside a clickpack ("softclick" -> "softclicks") */
export function categoryDirName(category: ClickCategory): string {
  return `${category}s`;
}
