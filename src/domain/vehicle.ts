export interface RegistryVehicle {
  plate: string;
  vin: string | null;
  vehicleYear: number | null;
  ownerName: string | null;
  baseName: string | null;
  baseType: string | null;
  licenseNumber: string | null;
  baseNumber: string | null;
  active: boolean;
  importedAt: number;
}

export type PlateValidation =
  | { valid: true; vehicle: RegistryVehicle }
  | { valid: false; vehicle: null };
