import type { StoreTransaction } from '../../store/store-transaction';

/** `<PREFIX>-<year>-<seq>`, sequence per prefix and year, gap-free and zero-padded to four digits. */
export async function nextDocumentNumber(tx: StoreTransaction, prefix: string, year: number): Promise<string> {
  const seq = await tx.next(`${prefix}:${year}`);
  return `${prefix}-${year}-${String(seq).padStart(4, '0')}`;
}
