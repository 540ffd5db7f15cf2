import { Firestore } from '@google-cloud/firestore';
import { createChildLogger } from '@docket/shared/src/logger.js';

const log = createChildLogger('infrastructure:firestore');

export interface FirestoreClientOptions {
  /** Defaults to `DOCKET_GCP_PROJECT_ID`, then to the ambient credentials' project. */
  readonly projectId?: string;
  /** Named database; defaults to `DOCKET_FIRESTORE_DATABASE`, then `(default)`. */
  readonly databaseId?: string;
}

export function createFirestoreClient(options: FirestoreClientOptions = {}): Firestore {
  const projectId = options.projectId ?? process.env['DOCKET_GCP_PROJECT_ID'];
  const databaseId = options.databaseId ?? process.env['DOCKET_FIRESTORE_DATABASE'];

  log.info(
    { projectId, databaseId: databaseId ?? '(default)', emulator: process.env['FIRESTORE_EMULATOR_HOST'] },
    'Creating Firestore client',
  );

  return new Firestore({ projectId, databaseId, ignoreUndefinedProperties: true });
}
