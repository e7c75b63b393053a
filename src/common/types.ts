export type LiteralValue =
  | string
  | number
  | boolean
  | null
  | RegExp
  | LiteralValue[]
  | LiteralMap;

export interface LiteralMap {
  [key: string]: LiteralValue;
}

export type LoaderOptions = Record<string, LiteralValue>;

/** `[dsn, user, password, ...extra]`, as handed to the schema loader. */
export type ConnectInfo = [
  dsn: string,
  user: string | undefined,
  password: string | undefined,
  ...extra: LiteralValue[],
];

export function isLiteralMap(value: LiteralValue | undefined): value is LiteralMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof RegExp)
  );
}
