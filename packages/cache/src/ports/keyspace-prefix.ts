/**
 * A prefix that scopes a store adapter to a partition of a shared keyspace
 * (e.g. a Redis cluster).
 *
 * @remarks
 * The prefix represents ownership of a keyspace partition by a subsystem
 * (`app:prod:lru:`), not a single global prefix for an application. Cache
 * namespaces are nested beneath it:
 *
 * ```
 * <keyspace prefix>{<namespace>}:entry:<key>
 * ```
 *
 * Adapters treat this value as an opaque string and prepend it verbatim.
 */
export type KeyspacePrefix = string
