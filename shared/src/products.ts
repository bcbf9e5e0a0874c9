// Catalog entry that owns serial numbers
export interface Product {
  productId: string;
  name: string;
  description: string | null;
  serialCount: number; // serial records ever created for this product
  createdAt: string;
  updatedAt: string;
}

// Per-product inventory rollup
export interface ProductInventory {
  productId: string;
  uploaded: number;
  assigned: number;
  available: number;
}

export interface ProductWithInventory extends Product {
  inventory: ProductInventory;
}
