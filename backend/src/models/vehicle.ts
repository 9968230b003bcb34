import { BatteryLowError, Result, err, ok } from './structures';

// Possible vehicle statuses
export type VehicleStatus = 'Available' | 'Rented';

interface VehicleBase {
  id: number;             // unique across the fleet, never reassigned
  name: string;
  dailyRate: number;
  status: VehicleStatus;
}

export interface Car extends VehicleBase {
  kind: 'Car';
  passengerCapacity: number; // informational only
}

export interface Truck extends VehicleBase {
  kind: 'Truck';
  maxLoadKg: number;
}

export interface ElectricCar extends VehicleBase {
  kind: 'ElectricCar';
  batteryCapacityKwh: number;
  currentChargeKwh: number;
}

// Closed set of vehicle variants
export type Vehicle = Car | Truck | ElectricCar;
export type VehicleKind = Vehicle['kind'];

export const PRICING = {
  loadFeePerKgPerDay: 0.1,
  lowChargeSurcharge: 50,
  lowChargeRatio: 0.2,   // surcharge applies below this share of capacity
  minStartChargeRatio: 0.1,
} as const;

type SpecOf<V extends Vehicle> = Omit<V, 'kind' | 'status'>;

// Factories: new vehicles always start Available
export function createCar(spec: SpecOf<Car>): Car {
  return { ...spec, kind: 'Car', status: 'Available' };
}

export function createTruck(spec: SpecOf<Truck>): Truck {
  return { ...spec, kind: 'Truck', status: 'Available' };
}

export function createElectricCar(spec: SpecOf<ElectricCar>): ElectricCar {
  const currentChargeKwh = clampCharge(spec.currentChargeKwh, spec.batteryCapacityKwh);
  return { ...spec, currentChargeKwh, kind: 'ElectricCar', status: 'Available' };
}

/**
 * Rental cost for `days` (>= 1). `loadKg` only affects trucks; a truck priced
 * without a load falls back to the plain daily rate.
 */
export function rentCost(vehicle: Vehicle, days: number, loadKg?: number): number {
  const base = vehicle.dailyRate * days;
  switch (vehicle.kind) {
    case 'Car':
      return base;
    case 'Truck':
      if (loadKg === undefined) return base;
      return base + loadKg * PRICING.loadFeePerKgPerDay * days;
    case 'ElectricCar': {
      const lowCharge = vehicle.currentChargeKwh < PRICING.lowChargeRatio * vehicle.batteryCapacityKwh;
      return base + (lowCharge ? PRICING.lowChargeSurcharge : 0);
    }
  }
}

// Start-up precondition; only electric cars can refuse to start
export function checkStart(vehicle: Vehicle): Result<null, BatteryLowError> {
  if (vehicle.kind !== 'ElectricCar') return ok(null);

  const requiredKwh = PRICING.minStartChargeRatio * vehicle.batteryCapacityKwh;
  if (vehicle.currentChargeKwh < requiredKwh) {
    return err({
      code: 'BATTERY_LOW',
      message: `Battery too low to start vehicle id=${vehicle.id}`,
      vehicleId: vehicle.id,
      chargeKwh: vehicle.currentChargeKwh,
      requiredKwh,
    });
  }
  return ok(null);
}

export function describeVehicle(vehicle: Vehicle): string {
  const head = `[${vehicle.id}] ${vehicle.name} (rate ${vehicle.dailyRate})`;
  switch (vehicle.kind) {
    case 'Car':
      return `${head} Car cap=${vehicle.passengerCapacity}`;
    case 'Truck':
      return `${head} Truck maxLoadKg=${vehicle.maxLoadKg}`;
    case 'ElectricCar':
      return `${head} Electric battery=${vehicle.currentChargeKwh}/${vehicle.batteryCapacityKwh}`;
  }
}

// All fields are primitives, so a shallow copy is fully independent
export function cloneVehicle<V extends Vehicle>(vehicle: V): V {
  return { ...vehicle };
}

/** Adds charge in place, clamped to the battery capacity. Returns the new charge. */
export function chargeBattery(car: ElectricCar, kwh: number): number {
  car.currentChargeKwh = clampCharge(car.currentChargeKwh + kwh, car.batteryCapacityKwh);
  return car.currentChargeKwh;
}

function clampCharge(kwh: number, capacity: number): number {
  return Math.min(capacity, Math.max(0, kwh));
}
