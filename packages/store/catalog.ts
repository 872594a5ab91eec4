// Catalog of halls and equipment
// Filled during setup, read-only afterwards.

import {
  EquipmentItemSchema,
  HallSchema,
  ValidationError,
  fail,
  ok,
  parseWith,
  type EquipmentItem,
  type EquipmentItemInput,
  type Hall,
  type HallInput,
  type Result,
} from '../core';

export class Catalog {
  private halls: Hall[] = [];
  private equipment: EquipmentItem[] = [];

  registerHall(input: HallInput): Result<Hall, ValidationError> {
    const parsed = parseWith(HallSchema, input);
    if (!parsed.ok) {
      return parsed;
    }

    if (this.findHall(parsed.value.number)) {
      return fail(
        new ValidationError('number', `Hall ${parsed.value.number} is already registered`)
      );
    }

    const hall: Hall = Object.freeze({ ...parsed.value });
    this.halls.push(hall);
    return ok(hall);
  }

  registerEquipment(input: EquipmentItemInput): Result<EquipmentItem, ValidationError> {
    const parsed = parseWith(EquipmentItemSchema, input);
    if (!parsed.ok) {
      return parsed;
    }

    if (this.findEquipment(parsed.value.name)) {
      return fail(
        new ValidationError('name', `Equipment "${parsed.value.name}" is already registered`)
      );
    }

    const item: EquipmentItem = Object.freeze({ ...parsed.value });
    this.equipment.push(item);
    return ok(item);
  }

  listHalls(): readonly Hall[] {
    return Object.freeze([...this.halls]);
  }

  listEquipment(): readonly EquipmentItem[] {
    return Object.freeze([...this.equipment]);
  }

  findHall(hallNumber: number): Hall | null {
    return this.halls.find((hall) => hall.number === hallNumber) ?? null;
  }

  findEquipment(name: string): EquipmentItem | null {
    const wanted = name.trim();
    return this.equipment.find((item) => item.name === wanted) ?? null;
  }
}
