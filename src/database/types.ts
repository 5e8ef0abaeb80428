export type DatabaseConfig = {
  sqlitePath: string
}

export type SqlParam = string | number | bigint | null

export type QueryResult<T> = {
  rows: T[]
  rowCount: number
}

export type DatabaseConnection = {
  query: <T = unknown>(sql: string, params?: SqlParam[]) => Promise<QueryResult<T>>
  transaction: <T>(fn: (tx: DatabaseConnection) => Promise<T>) => Promise<T>
  close: () => Promise<void>
}

export type Database = DatabaseConnection & {
  migrate: () => Promise<void>
}
