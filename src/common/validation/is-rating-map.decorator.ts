import { registerDecorator } from 'class-validator';
import type { ValidationOptions } from 'class-validator';
import { healthQuestions } from '../config/health-questions';

const KNOWN_IDS = new Set(healthQuestions.map((q) => q.id));

function isRatingMap(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const entries: [string, unknown][] = Object.entries(value);
  return entries.every(
    ([id, rating]) =>
      KNOWN_IDS.has(id) &&
      typeof rating === 'number' &&
      Number.isInteger(rating) &&
      rating >= 1 &&
      rating <= 5,
  );
}

/** Health-check question id -> integer rating between 1 and 5. */
export function IsRatingMap(options?: ValidationOptions): PropertyDecorator {
  return (target: object, propertyName: string | symbol) => {
    registerDecorator({
      name: 'isRatingMap',
      target: target.constructor,
      propertyName: String(propertyName),
      options: {
        message: '$property must map health-check question ids to ratings from 1 to 5',
        ...options,
      },
      validator: { validate: isRatingMap },
    });
  };
}
