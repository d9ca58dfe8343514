import {describe, it, expect} from 'vitest';
import {createExerciseRecord} from '../services/setlog';
import {serializeToSetCentric} from './serializers';
import {validateSetCentricDocument} from './validator';

const DOCUMENT = serializeToSetCentric(
  [createExerciseRecord('Squat', [{repetitions: 5, weight: {amount: 100, unit: 'kg'}}])],
  new Date('2024-01-15T10:30:00Z')
);

describe('validateSetCentricDocument', () => {
  it('accepts a serialized document', () => {
    const result = validateSetCentricDocument(JSON.parse(JSON.stringify(DOCUMENT)));

    expect(result.ok).toBe(true);
  });

  it('accepts a document with no exercises', () => {
    expect(validateSetCentricDocument({...DOCUMENT, exercises: []}).ok).toBe(true);
  });

  it('reports a missing property', () => {
    const {exercises: _omitted, ...withoutExercises} = DOCUMENT;

    expect(validateSetCentricDocument(withoutExercises)).toEqual({
      ok: false,
      errors: "data must have required property 'exercises'",
    });
  });

  it('reports every problem at once', () => {
    const result = validateSetCentricDocument({
      ...DOCUMENT,
      workout_id: 'workout-1',
      exercises: [{name: 'Squat', equipment: 'other', sets: []}],
    });

    expect(result).toEqual({
      ok: false,
      errors: [
        'data/workout_id must match pattern "^w_[0-9]{8}_[0-9]{6}$"',
        'data/exercises/0/sets must NOT have fewer than 1 items',
      ].join('\n'),
    });
  });

  it('rejects zero repetitions', () => {
    const result = validateSetCentricDocument({
      ...DOCUMENT,
      exercises: [
        {name: 'Squat', equipment: 'other', sets: [{setNumber: 1, repetitions: 0, weight: {amount: 100, unit: 'kg'}}]},
      ],
    });

    expect(result).toEqual({
      ok: false,
      errors: 'data/exercises/0/sets/0/repetitions must be >= 1',
    });
  });
});
