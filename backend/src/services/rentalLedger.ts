import { RentalRecord } from '../models/structures';

// Active rentals by vehicle id, at most one per vehicle
export class RentalLedger {
  private readonly records = new Map<number, RentalRecord>();

  open(record: RentalRecord): void {
    if (this.records.has(record.vehicleId)) {
      throw new Error(`Vehicle id=${record.vehicleId} already has an active rental`);
    }
    this.records.set(record.vehicleId, record);
  }

  get(vehicleId: number): RentalRecord | undefined {
    return this.records.get(vehicleId);
  }

  has(vehicleId: number): boolean {
    return this.records.has(vehicleId);
  }

  close(vehicleId: number): boolean {
    return this.records.delete(vehicleId);
  }

  // Copies, so callers cannot rewrite the renter or due date of a live rental
  list(): RentalRecord[] {
    return [...this.records.values()].map(r => ({
      ...r,
      rentedAt: new Date(r.rentedAt.getTime()),
      dueAt: new Date(r.dueAt.getTime()),
    }));
  }
}
