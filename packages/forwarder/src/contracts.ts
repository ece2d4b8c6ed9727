export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>;
