import type {
  PaginatedResponse,
  ProductInventory,
  ProductWithInventory,
} from '@warranty/shared';
import { countsByProduct } from './ledger.js';
import { getProduct, listProducts } from './products.js';
import type { PaginationInput } from '../validation.js';

// Read-only rollup; a claim landing between the two counts may skew it briefly
export async function productInventory(productId: string): Promise<ProductInventory> {
  await getProduct(productId);
  const { uploaded, assigned } = await countsByProduct(productId);

  return {
    productId,
    uploaded,
    assigned,
    available: Math.max(0, uploaded - assigned),
  };
}

export async function listProductsWithInventory(
  query: PaginationInput
): Promise<PaginatedResponse<ProductWithInventory>> {
  const page = await listProducts(query);

  const items = await Promise.all(
    page.items.map(async (product) => {
      const { uploaded, assigned } = await countsByProduct(product.productId);
      return {
        ...product,
        inventory: {
          productId: product.productId,
          uploaded,
          assigned,
          available: Math.max(0, uploaded - assigned),
        },
      };
    })
  );

  return { ...page, items };
}
