export type CacheLogKey = string

export type Milliseconds = number
