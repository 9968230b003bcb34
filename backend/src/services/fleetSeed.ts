import fs from 'fs';
import { Vehicle, createCar, createElectricCar, createTruck } from '../models/vehicle';

// Helpers:
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonNegative(entry: Record<string, unknown>, key: string, index: number): number {
  const value = entry[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new Error(`Fleet seed entry #${index}: "${key}" must be a non-negative number`);
  }
  return value;
}

function parseEntry(raw: unknown, index: number): Vehicle {
  if (!isRecord(raw)) {
    throw new Error(`Fleet seed entry #${index} must be an object`);
  }
  const { id, name, kind } = raw;
  if (typeof id !== 'number' || !Number.isInteger(id)) {
    throw new Error(`Fleet seed entry #${index}: "id" must be an integer`);
  }
  if (typeof name !== 'string' || !name.trim()) {
    throw new Error(`Fleet seed entry #${index}: "name" is required`);
  }
  const dailyRate = nonNegative(raw, 'dailyRate', index);

  switch (kind) {
    case 'Car':
      return createCar({ id, name, dailyRate, passengerCapacity: nonNegative(raw, 'passengerCapacity', index) });
    case 'Truck':
      return createTruck({ id, name, dailyRate, maxLoadKg: nonNegative(raw, 'maxLoadKg', index) });
    case 'ElectricCar':
      return createElectricCar({
        id,
        name,
        dailyRate,
        batteryCapacityKwh: nonNegative(raw, 'batteryCapacityKwh', index),
        currentChargeKwh: nonNegative(raw, 'currentChargeKwh', index),
      });
    default:
      throw new Error(`Fleet seed entry #${index}: unknown kind ${JSON.stringify(kind)}`);
  }
}

/** Validates a parsed seed document; throws on the first bad entry or a repeated id. */
export function parseFleetSeed(doc: unknown): Vehicle[] {
  if (!Array.isArray(doc)) {
    throw new Error('Fleet seed must be a JSON array');
  }
  const vehicles = doc.map((raw: unknown, i) => parseEntry(raw, i));

  const seen = new Set<number>();
  for (const v of vehicles) {
    if (seen.has(v.id)) throw new Error(`Fleet seed has duplicate vehicle id=${v.id}`);
    seen.add(v.id);
  }
  return vehicles;
}

// Load the initial fleet from a JSON file (read once, never written back)
export function loadFleetSeed(filePath: string): Vehicle[] {
  const doc: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return parseFleetSeed(doc);
}
