
// Failure codes surfaced by the rental service
export type ServiceErrorCode =
  | 'VEHICLE_NOT_FOUND'
  | 'VEHICLE_UNAVAILABLE'
  | 'OVERLOAD'
  | 'BATTERY_LOW'
  | 'NOT_RENTED'
  | 'RENTER_MISMATCH'
  | 'SEVERE_DAMAGE'
  | 'NOT_ELECTRIC';

type ErrorBase<C extends ServiceErrorCode> = {
  code: C;
  message: string;
  vehicleId: number;
};

export type VehicleNotFoundError = ErrorBase<'VEHICLE_NOT_FOUND'>;
export type VehicleUnavailableError = ErrorBase<'VEHICLE_UNAVAILABLE'>;
export type OverloadError = ErrorBase<'OVERLOAD'> & { requestedKg: number; maxKg: number };
export type BatteryLowError = ErrorBase<'BATTERY_LOW'> & { chargeKwh: number; requiredKwh: number };
export type NotRentedError = ErrorBase<'NOT_RENTED'>;
export type RenterMismatchError = ErrorBase<'RENTER_MISMATCH'> & { renterId: string };
export type SevereDamageError = ErrorBase<'SEVERE_DAMAGE'>;
export type NotElectricError = ErrorBase<'NOT_ELECTRIC'>;

export type ServiceError =
  | VehicleNotFoundError
  | VehicleUnavailableError
  | OverloadError
  | BatteryLowError
  | NotRentedError
  | RenterMismatchError
  | SevereDamageError
  | NotElectricError;

export type Ok<T> = { ok: true; data: T };
export type Err<E extends ServiceError = ServiceError> = { ok: false; error: E };
export type Result<T, E extends ServiceError = ServiceError> = Ok<T> | Err<E>;

// Result constructors, for uniform error handling
export function ok<T>(data: T): Ok<T> {
  return { ok: true, data };
}

export function err<E extends ServiceError>(error: E): Err<E> {
  return { ok: false, error };
}

// Active rental, keyed by vehicle id in the ledger
export interface RentalRecord {
  vehicleId: number;
  renterId: string;
  rentedAt: Date;
  dueAt: Date;
  committedLoadKg: number | null; // trucks only
}
