import { strict as assert } from 'node:assert';
import test from 'node:test';

import { buildHallLockKey, buildSlotKey } from './slot_keys';
import {
  intervalsOverlap,
  parseDateLabel,
  parseTimeLabel,
  slotInterval,
  toDayNumber,
} from './slot_time';

test('date labels normalize to YYYY-MM-DD from both accepted forms', () => {
  assert.equal(parseDateLabel('2025-02-10'), '2025-02-10');
  assert.equal(parseDateLabel('10.02.2025'), '2025-02-10');
  assert.equal(parseDateLabel(' 2024-02-29 '), '2024-02-29');
});

test('date labels that are not on the calendar are rejected', () => {
  assert.equal(parseDateLabel('2025-02-29'), null);
  assert.equal(parseDateLabel('31.04.2025'), null);
  assert.equal(parseDateLabel('2025-13-01'), null);
  assert.equal(parseDateLabel('2025-00-10'), null);
  assert.equal(parseDateLabel('2025/02/10'), null);
  assert.equal(parseDateLabel(''), null);
});

test('time labels normalize to HH:mm with minute precision', () => {
  assert.equal(parseTimeLabel('15:00'), '15:00');
  assert.equal(parseTimeLabel('9:05'), '09:05');
  assert.equal(parseTimeLabel('09:30:00'), '09:30');
  assert.equal(parseTimeLabel('09:30:15'), null);
  assert.equal(parseTimeLabel('24:00'), null);
  assert.equal(parseTimeLabel('12:60'), null);
  assert.equal(parseTimeLabel('noon'), null);
});

test('years below 100 keep their own day numbers', () => {
  assert.equal(parseDateLabel('0025-02-10'), '0025-02-10');
  assert.equal(parseDateLabel('0024-02-29'), '0024-02-29');
  assert.equal(parseDateLabel('0025-02-29'), null);
  assert.notEqual(toDayNumber('0025-02-10'), toDayNumber('1925-02-10'));
  assert.equal(toDayNumber('0025-02-11') - toDayNumber('0025-02-10'), 1);
  assert.equal(toDayNumber('1970-01-01'), 0);
});

test('slot intervals are half-open and continue across midnight', () => {
  const late = slotInterval('2025-02-10', '23:00', 2);
  const nextMorning = slotInterval('2025-02-11', '00:30', 1);
  const nextLater = slotInterval('2025-02-11', '01:00', 1);

  assert.equal(late.end - late.start, 120);
  assert.equal(nextMorning.start - late.start, 90);
  assert.equal(intervalsOverlap(late, nextMorning), true);
  assert.equal(intervalsOverlap(late, nextLater), false);
  assert.equal(toDayNumber('2025-02-11') - toDayNumber('2025-02-10'), 1);
});

test('slot keys normalize times and lock keys carry only the hall', () => {
  assert.equal(buildSlotKey(1, '2025-02-10', '15:00'), '1|2025-02-10|15:00');
  assert.equal(buildSlotKey(3, '2025-02-10', '9:05'), '3|2025-02-10|09:05');
  assert.equal(buildSlotKey(3, '2025-02-10', '09:05:00'), '3|2025-02-10|09:05');
  assert.equal(buildSlotKey(3, '2025-02-10', 'noon'), '3|2025-02-10|noon');
  assert.equal(buildHallLockKey(7), 'hall|7');
});
