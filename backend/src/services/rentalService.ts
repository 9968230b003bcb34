import { Vehicle, chargeBattery, checkStart, rentCost } from '../models/vehicle';
import { Err, RentalRecord, Result, ServiceError, err, ok } from '../models/structures';
import { FleetEntry, FleetRegistry } from './fleetRegistry';
import { RentalLedger } from './rentalLedger';
import { ActivityLog } from './activityLog';
import { Clock, systemClock } from './clock';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const RETURN_FEES = {
  latePerDay: 20,
  minorDamage: 100,
} as const;

export interface RentReceipt {
  vehicleId: number;
  renterId: string;
  days: number;
  cost: number;
  dueAt: Date;
}

export interface ReturnReceipt {
  vehicleId: number;
  renterId: string;
  baseCost: number;
  lateDays: number;
  latePenalty: number;
  damageFee: number;
  penalty: number;
  total: number;
}

export interface ChargeReceipt {
  vehicleId: number;
  addedKwh: number;
  chargeKwh: number;
  capacityKwh: number;
}

// Even ids count as severe damage, odd ids as minor
export function isSevereDamage(vehicleId: number): boolean {
  return vehicleId % 2 === 0;
}

// Whole overdue days charged; any overdue time counts as at least one day
export function lateDaysBetween(dueAt: Date, returnedAt: Date): number {
  const overdueMs = returnedAt.getTime() - dueAt.getTime();
  if (overdueMs <= 0) return 0;
  const hoursLate = Math.floor(overdueMs / HOUR_MS);
  return Math.floor(hoursLate / 24) + 1;
}

/**
 * Rent / return transactions over the fleet registry and rental ledger.
 * Every call writes exactly one activity log line, success or failure, and a
 * failed call leaves fleet and ledger untouched (severe damage aside).
 */
export class RentalService {
  constructor(
    private readonly fleet: FleetRegistry,
    private readonly ledger: RentalLedger,
    private readonly activity: ActivityLog,
    private readonly clock: Clock = systemClock
  ) {}

  rent(renterId: string, vehicleId: number, days: number, loadKg = 0): Result<RentReceipt> {
    const vehicle = this.fleet.find(vehicleId);
    if (!vehicle) {
      return this.fail({ code: 'VEHICLE_NOT_FOUND', message: `Vehicle not found id=${vehicleId}`, vehicleId });
    }
    if (vehicle.status === 'Rented') {
      return this.fail({
        code: 'VEHICLE_UNAVAILABLE',
        message: `Vehicle not available (already rented) id=${vehicleId}`,
        vehicleId,
      });
    }
    if (vehicle.kind === 'Truck' && loadKg > vehicle.maxLoadKg) {
      return this.fail({
        code: 'OVERLOAD',
        message: `Overload attempt: requested load ${loadKg} > max ${vehicle.maxLoadKg} for vehicle id=${vehicleId}`,
        vehicleId,
        requestedKg: loadKg,
        maxKg: vehicle.maxLoadKg,
      });
    }

    const cost = this.priceFor(vehicle, days, loadKg);

    // Must pass before anything is written
    const start = checkStart(vehicle);
    if (!start.ok) {
      return this.fail({ ...start.error, message: `Start failed: ${start.error.message}` });
    }

    const rentedAt = this.clock.now();
    const dueAt = new Date(rentedAt.getTime() + days * DAY_MS);
    this.ledger.open({
      vehicleId,
      renterId,
      rentedAt,
      dueAt,
      committedLoadKg: vehicle.kind === 'Truck' ? loadKg : null,
    });
    vehicle.status = 'Rented';

    this.activity.log(`Rented vehicle id=${vehicleId} to member=${renterId} for ${days} days; cost=${cost}`);
    return ok({ vehicleId, renterId, days, cost, dueAt });
  }

  returnVehicle(renterId: string, vehicleId: number, actualDays: number, damaged: boolean): Result<ReturnReceipt> {
    const vehicle = this.fleet.find(vehicleId);
    if (!vehicle) {
      return this.fail({
        code: 'VEHICLE_NOT_FOUND',
        message: `Return failed: vehicle not found id=${vehicleId}`,
        vehicleId,
      });
    }
    const record = this.ledger.get(vehicleId);
    if (!record) {
      return this.fail({
        code: 'NOT_RENTED',
        message: `Return failed: vehicle not rented id=${vehicleId}`,
        vehicleId,
      });
    }
    if (record.renterId !== renterId) {
      return this.fail({
        code: 'RENTER_MISMATCH',
        message: `Return failed: member mismatch for vehicle id=${vehicleId}`,
        vehicleId,
        renterId,
      });
    }

    // Trucks are repriced with the load committed at rental time
    const baseCost = this.priceFor(vehicle, actualDays, record.committedLoadKg ?? 0);

    const lateDays = lateDaysBetween(record.dueAt, this.clock.now());
    const latePenalty = lateDays * RETURN_FEES.latePerDay;

    let damageFee = 0;
    if (damaged) {
      if (isSevereDamage(vehicleId)) {
        // The vehicle comes back even though the return is refused
        this.release(vehicle);
        return this.fail({
          code: 'SEVERE_DAMAGE',
          message: `Severe damage reported on return for vehicle id=${vehicleId}`,
          vehicleId,
        });
      }
      damageFee = RETURN_FEES.minorDamage;
    }

    const penalty = latePenalty + damageFee;
    const total = baseCost + penalty;
    this.release(vehicle);

    const damageNote = damageFee > 0 ? ` (minor damage fee ${damageFee})` : '';
    this.activity.log(
      `Vehicle id=${vehicleId} returned by ${renterId}. Base=${baseCost} Penalty=${penalty} Total=${total}${damageNote}`
    );
    return ok({ vehicleId, renterId, baseCost, lateDays, latePenalty, damageFee, penalty, total });
  }

  chargeBattery(vehicleId: number, kwh: number, requestedBy?: string): Result<ChargeReceipt> {
    const vehicle = this.fleet.find(vehicleId);
    if (!vehicle) {
      return this.fail({
        code: 'VEHICLE_NOT_FOUND',
        message: `Charge failed: vehicle not found id=${vehicleId}`,
        vehicleId,
      });
    }
    if (vehicle.kind !== 'ElectricCar') {
      return this.fail({
        code: 'NOT_ELECTRIC',
        message: `Charge failed: vehicle id=${vehicleId} is not an EV`,
        vehicleId,
      });
    }

    const chargeKwh = chargeBattery(vehicle, kwh);
    const requester = requestedBy ? ` requested by member ${requestedBy}` : '';
    this.activity.log(`Charged EV id=${vehicleId} + ${kwh}kWh (now ${chargeKwh} kWh)${requester}`);
    return ok({ vehicleId, addedKwh: kwh, chargeKwh, capacityKwh: vehicle.batteryCapacityKwh });
  }

  listFleet(): FleetEntry[] {
    return this.fleet.list();
  }

  activeRentals(): RentalRecord[] {
    return this.ledger.list();
  }

  private priceFor(vehicle: Vehicle, days: number, loadKg: number): number {
    return vehicle.kind === 'Truck' ? rentCost(vehicle, days, loadKg) : rentCost(vehicle, days);
  }

  private release(vehicle: Vehicle): void {
    vehicle.status = 'Available';
    this.ledger.close(vehicle.id);
  }

  private fail(error: ServiceError): Err {
    this.activity.log(error.message);
    return err(error);
  }
}
