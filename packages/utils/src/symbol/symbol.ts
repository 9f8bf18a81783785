/**
 * Normalize an exchange instrument id to a storage-safe name
 *
 * @example normalizeSymbol('ETH-USDT-SWAP') // 'eth_usdt'
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.replace('-SWAP', '').split('-').join('_').toLowerCase();
}
