/**
 * Profile summary and skill assessment
 */

import type { UserRecord } from './users';

export type SkillLevel = 'Expert' | 'Advanced' | 'Intermediate' | 'Beginner';

// WPM that counts as a perfect speed score
const WPM_CEILING = 200;

export interface SkillAssessment {
  /** 0..100 */
  rating: number;
  level: SkillLevel;
}

/**
 * Weighted blend: half speed, 30% best accuracy, 20% average accuracy.
 */
export function assessSkill(user: UserRecord): SkillAssessment {
  const normalizedWpm = (user.bestWpm / WPM_CEILING) * 100;
  const rating = Math.min(
    100,
    normalizedWpm * 0.5 + user.bestAccuracy * 0.3 + user.averageAccuracy * 0.2,
  );

  let level: SkillLevel;
  if (rating >= 100) level = 'Expert';
  else if (rating > 80) level = 'Advanced';
  else if (rating > 60) level = 'Intermediate';
  else level = 'Beginner';

  return { rating, level };
}

export function formatProfile(user: UserRecord): string[] {
  return [
    `Tests completed: ${user.testsCompleted}`,
    `Best WPM: ${user.bestWpm.toFixed(2)}`,
    `Best accuracy: ${user.bestAccuracy.toFixed(2)}%`,
    `Average accuracy: ${user.averageAccuracy.toFixed(2)}%`,
    `Endurance high score: ${user.enduranceHighScore} words`,
  ];
}
