import { strict as assert } from 'node:assert';
import test from 'node:test';

import { findConflicts, isAvailable } from './availability';
import type { Booking, Client, Hall } from './types';

const CLIENT: Client = {
  id: 'client-1',
  firstName: 'Anna',
  lastName: 'Ivanova',
  phone: '89001234567',
  discount: 0,
};
const HALL_ONE: Hall = { number: 1, rate: 2000, capacity: 10 };
const HALL_TWO: Hall = { number: 2, rate: 3000, capacity: 20 };

function booking(id: string, hall: Hall, date: string, time: string, durationHours: number): Booking {
  return { id, client: CLIENT, hall, equipment: [], date, time, durationHours, cost: 0 };
}

const EXISTING = [booking('b-1', HALL_ONE, '2025-02-10', '10:00', 2)];

test('an empty ledger is always available', () => {
  assert.equal(isAvailable([], HALL_ONE, '2025-02-10', '10:00', 8), true);
});

test('overlap policy blocks any intersecting interval in the same hall', () => {
  assert.equal(isAvailable(EXISTING, HALL_ONE, '2025-02-10', '10:00', 1), false);
  assert.equal(isAvailable(EXISTING, HALL_ONE, '2025-02-10', '11:00', 1), false);
  assert.equal(isAvailable(EXISTING, HALL_ONE, '2025-02-10', '09:30', 1), false);
  assert.equal(isAvailable(EXISTING, HALL_ONE, '2025-02-10', '08:00', 4), false);
});

test('overlap policy treats intervals as half-open', () => {
  assert.equal(isAvailable(EXISTING, HALL_ONE, '2025-02-10', '12:00', 1), true);
  assert.equal(isAvailable(EXISTING, HALL_ONE, '2025-02-10', '08:00', 2), true);
});

test('other halls and other dates never conflict', () => {
  assert.equal(isAvailable(EXISTING, HALL_TWO, '2025-02-10', '10:00', 2), true);
  assert.equal(isAvailable(EXISTING, HALL_ONE, '2025-02-11', '10:00', 2), true);
});

test('a late booking blocks the early hours of the next date', () => {
  const late = [booking('b-late', HALL_ONE, '2025-02-10', '23:00', 3)];
  assert.equal(isAvailable(late, HALL_ONE, '2025-02-11', '01:00', 1), false);
  assert.equal(isAvailable(late, HALL_ONE, '2025-02-11', '02:00', 1), true);
});

test('exact policy only blocks an identical start in the same hall', () => {
  assert.equal(isAvailable(EXISTING, HALL_ONE, '2025-02-10', '10:00', 1, 'exact'), false);
  assert.equal(isAvailable(EXISTING, HALL_ONE, '2025-02-10', '11:00', 1, 'exact'), true);
  assert.equal(isAvailable(EXISTING, HALL_TWO, '2025-02-10', '10:00', 1, 'exact'), true);
});

test('findConflicts returns the blocking bookings', () => {
  const existing = [
    ...EXISTING,
    booking('b-2', HALL_ONE, '2025-02-10', '12:00', 2),
    booking('b-3', HALL_TWO, '2025-02-10', '11:00', 2),
  ];
  const conflicts = findConflicts(existing, {
    hall: HALL_ONE,
    date: '2025-02-10',
    time: '11:00',
    durationHours: 2,
  });
  assert.deepEqual(
    conflicts.map((item) => item.id),
    ['b-1', 'b-2']
  );
});
