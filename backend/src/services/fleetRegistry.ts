import { Vehicle, VehicleKind, VehicleStatus, cloneVehicle, describeVehicle } from '../models/vehicle';

export interface FleetEntry {
  id: number;
  kind: VehicleKind;
  status: VehicleStatus;
  description: string;
}

// Sole owner of the vehicles; everything else looks them up by id
export class FleetRegistry {
  private readonly vehicles: Vehicle[] = [];

  // Stores a copy of the template. Ids are not deduplicated here.
  add(template: Vehicle): Vehicle {
    const vehicle = cloneVehicle(template);
    this.vehicles.push(vehicle);
    return vehicle;
  }

  find(id: number): Vehicle | undefined {
    return this.vehicles.find(v => v.id === id);
  }

  list(): FleetEntry[] {
    return this.vehicles.map(v => ({
      id: v.id,
      kind: v.kind,
      status: v.status,
      description: describeVehicle(v),
    }));
  }

  get size(): number {
    return this.vehicles.length;
  }
}
