/**
 * The datastore could not complete an operation (connection lost, timeout, unexpected row shape).
 * Fatal to the request; never retried by the workflow.
 */
export class DatastoreError extends Error {
  constructor(operation: string, cause: unknown) {
    super(`Datastore operation failed: ${operation}`, { cause });
    this.name = 'DatastoreError';
  }
}
