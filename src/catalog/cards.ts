import type { CardDefinition } from '../types/core.js';

export const DEFAULT_CARDS: readonly CardDefinition[] = [
  {
    id: 'pushups-10',
    kind: 'exercise',
    exerciseType: 'push_ups',
    text: '💪 10 push-ups. Knees down is fine, keep your back straight.',
    minDurationSeconds: 20,
    weight: 1,
  },
  {
    id: 'pushups-desk-15',
    kind: 'exercise',
    exerciseType: 'push_ups',
    text: '💪 15 incline push-ups against your desk.',
    minDurationSeconds: 30,
    weight: 1,
  },
  {
    id: 'squats-15',
    kind: 'exercise',
    exerciseType: 'squats',
    text: '🦵 15 bodyweight squats.',
    minDurationSeconds: 30,
    weight: 1,
  },
  {
    id: 'squats-slow-10',
    kind: 'exercise',
    exerciseType: 'squats',
    text: '🦵 10 slow squats, three seconds down, one second up.',
    minDurationSeconds: 40,
    weight: 1,
  },
  {
    id: 'plank-30',
    kind: 'exercise',
    exerciseType: 'plank',
    text: '🧱 Hold a plank for 30 seconds.',
    minDurationSeconds: 30,
    weight: 1,
  },
  {
    id: 'plank-side-45',
    kind: 'exercise',
    exerciseType: 'plank',
    text: '🧱 Side plank, 20 seconds per side.',
    minDurationSeconds: 45,
    weight: 1,
  },
  {
    id: 'stretch-neck',
    kind: 'exercise',
    exerciseType: 'stretch',
    text: '🙆 Neck and shoulder rolls, 10 each direction.',
    minDurationSeconds: 45,
    weight: 1,
  },
  {
    id: 'stretch-hamstring',
    kind: 'exercise',
    exerciseType: 'stretch',
    text: '🙆 Standing hamstring stretch, 20 seconds per leg.',
    minDurationSeconds: 40,
    weight: 1,
  },
  {
    id: 'walk-2min',
    kind: 'exercise',
    exerciseType: 'walk',
    text: '🚶 Walk around for 2 minutes.',
    minDurationSeconds: 120,
    weight: 1,
  },
  {
    id: 'walk-stairs',
    kind: 'exercise',
    exerciseType: 'walk',
    text: '🚶 Take the stairs up one floor and back.',
    minDurationSeconds: 60,
    weight: 1,
  },
  {
    id: 'tip-hydration',
    kind: 'wellness_tip',
    text: '💧 Drink a glass of water. Mild dehydration hurts focus.',
    weight: 1,
  },
  {
    id: 'tip-posture',
    kind: 'wellness_tip',
    text: '🪑 Posture check: feet flat, screen at eye level, shoulders relaxed.',
    weight: 1,
  },
  {
    id: 'tip-eyes',
    kind: 'wellness_tip',
    text: '👀 20-20-20: look at something 20 feet away for 20 seconds.',
    weight: 1,
  },
  {
    id: 'tip-sedentary',
    kind: 'wellness_tip',
    text: '⚠️ Sitting for hours straight raises health risks. Stand up between cards too.',
    weight: 1,
  },
];
