import { strict as assert } from 'node:assert';
import test from 'node:test';

import { ValidationError } from '../core';
import { Catalog } from './catalog';

test('registered halls and equipment are listed in registration order', () => {
  const catalog = new Catalog();
  catalog.registerHall({ number: 2, rate: 3500, capacity: 20 });
  catalog.registerHall({ number: 1, rate: 2000, capacity: 10 });
  catalog.registerEquipment({ name: '  Softbox ', rate: 300 });

  assert.deepEqual(
    catalog.listHalls().map((hall) => hall.number),
    [2, 1]
  );
  assert.deepEqual(catalog.listEquipment(), [{ name: 'Softbox', rate: 300 }]);
  assert.equal(catalog.findEquipment('Softbox')?.rate, 300);
  assert.equal(catalog.findHall(1)?.rate, 2000);
  assert.equal(catalog.findHall(9), null);
});

test('duplicate hall numbers and equipment names are rejected', () => {
  const catalog = new Catalog();
  catalog.registerHall({ number: 1, rate: 2000, capacity: 10 });
  catalog.registerEquipment({ name: 'Softbox', rate: 300 });

  const hall = catalog.registerHall({ number: 1, rate: 100, capacity: 5 });
  const item = catalog.registerEquipment({ name: 'Softbox ', rate: 10 });

  assert.equal(hall.ok, false);
  if (!hall.ok) {
    assert.equal(hall.error.field, 'number');
    assert.equal(hall.error.message, 'Hall 1 is already registered');
  }
  assert.equal(item.ok, false);
  assert.equal(catalog.listHalls().length, 1);
  assert.equal(catalog.listEquipment().length, 1);
});

test('negative rates and malformed halls are validation errors', () => {
  const catalog = new Catalog();

  const negative = catalog.registerHall({ number: 1, rate: -1, capacity: 10 });
  const fractional = catalog.registerHall({ number: 1.5, rate: 100, capacity: 10 });
  const unnamed = catalog.registerEquipment({ name: '   ', rate: 10 });

  assert.equal(negative.ok, false);
  if (!negative.ok) {
    assert.ok(negative.error instanceof ValidationError);
    assert.equal(negative.error.field, 'rate');
  }
  assert.equal(fractional.ok, false);
  assert.equal(unnamed.ok, false);
  if (!unnamed.ok) {
    assert.equal(unnamed.error.field, 'name');
  }
  assert.equal(catalog.listHalls().length, 0);
});

test('snapshots are frozen and detached from the catalog', () => {
  const catalog = new Catalog();
  catalog.registerHall({ number: 1, rate: 2000, capacity: 10 });

  const snapshot = catalog.listHalls();
  catalog.registerHall({ number: 2, rate: 3500, capacity: 20 });

  assert.equal(snapshot.length, 1);
  assert.equal(Object.isFrozen(snapshot), true);
  assert.equal(Object.isFrozen(snapshot[0]), true);
});
