import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';

export interface Package {
  packageId: string;
  name: string;
  cidAmount: number;
  priceCents: number;
}

export const DEFAULT_PACKAGES: readonly Package[] = [
  { packageId: '1', name: 'Small', cidAmount: 25, priceCents: 533 },
  { packageId: '2', name: 'Medium', cidAmount: 50, priceCents: 667 },
  { packageId: '3', name: 'Large', cidAmount: 100, priceCents: 1253 },
  { packageId: '4', name: 'Premium', cidAmount: 500, priceCents: 5653 },
  { packageId: '5', name: 'Ultra', cidAmount: 1000, priceCents: 10267 },
  { packageId: '6', name: 'Professional', cidAmount: 2000, priceCents: 18480 },
  { packageId: '7', name: 'Enterprise', cidAmount: 5000, priceCents: 40800 },
  { packageId: '8', name: 'Corporate', cidAmount: 10000, priceCents: 76270 },
];

/**
 * Read-only price list. Tests inject their own packages.
 */
export class PackageCatalog {
  private readonly packages: ReadonlyMap<string, Package>;

  constructor(packages: readonly Package[] = DEFAULT_PACKAGES) {
    this.packages = new Map(packages.map((pkg) => [pkg.packageId, { ...pkg }]));
  }

  list(): Package[] {
    return [...this.packages.values()].map((pkg) => ({ ...pkg }));
  }

  find(packageId: string): Package | null {
    const pkg = this.packages.get(packageId);
    return pkg ? { ...pkg } : null;
  }

  /**
   * Throws UNKNOWN_PACKAGE for ids not in the catalog
   */
  get(packageId: string): Package {
    const pkg = this.find(packageId);
    if (!pkg) {
      throw new ApiError(ErrorCode.UNKNOWN_PACKAGE, `Unknown package: ${packageId}`);
    }
    return pkg;
  }
}
