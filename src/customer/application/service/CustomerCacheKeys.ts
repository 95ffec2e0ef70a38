/**
 * 顧客クエリのキャッシュキー
 *
 * 投影ハンドラー（削除）とクエリサービス（読み書き）で同じキーを使う。
 */
export const CustomerCacheKeys = {
  all: 'GetAllCustomerQuery',
  byId: (customerId: string): string => `GetCustomerByIdQuery_${customerId}`,
} as const;

/**
 * 顧客 1 件が変わったときに古くなるキー
 */
export function staleKeysFor(customerId: string): string[] {
  return [CustomerCacheKeys.all, CustomerCacheKeys.byId(customerId)];
}
