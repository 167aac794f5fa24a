import { registerDecorator } from 'class-validator';
import type { ValidationOptions } from 'class-validator';

function isAnswerSet(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const values: unknown[] = Object.values(value);
  return values.every(
    (v) => typeof v === 'string' || (typeof v === 'number' && Number.isFinite(v)),
  );
}

/** Plain object whose values are option values (strings or finite numbers). */
export function IsAnswerSet(options?: ValidationOptions): PropertyDecorator {
  return (target: object, propertyName: string | symbol) => {
    registerDecorator({
      name: 'isAnswerSet',
      target: target.constructor,
      propertyName: String(propertyName),
      options: {
        message: '$property must map question ids to string or number answers',
        ...options,
      },
      validator: { validate: isAnswerSet },
    });
  };
}
