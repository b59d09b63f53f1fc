export interface Variant {
  id: string;
  productId: string;
  sku: string;
  name: string;
  unitPrice: number;
  taxRateBps: number;
  isSet: boolean;
  priceEffectiveFrom: string;
}

/** Price history entry; current price lives on the variant, history is never rewritten. */
export interface VariantPrice {
  variantId: string;
  unitPrice: number;
  taxRateBps: number;
  effectiveFrom: string;
}

export interface Customer {
  id: string;
  name: string;
  createdAt: string;
}

export interface Supplier {
  id: string;
  name: string;
  createdAt: string;
}
