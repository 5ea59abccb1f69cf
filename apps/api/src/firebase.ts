import fs from 'node:fs';
import admin from 'firebase-admin';
import { getEnv } from './env.js';
import { ConfigError, errorMessage } from './rental/errors.js';

let app: admin.app.App | undefined;

function readServiceAccount(json: string, origin: string): admin.ServiceAccount {
  try {
    return JSON.parse(json) as admin.ServiceAccount;
  } catch (err) {
    throw new ConfigError(`Firebase service account from ${origin} is not valid JSON: ${errorMessage(err)}`);
  }
}

function initFirebaseApp(): admin.app.App {
  if (app) return app;

  const env = getEnv();

  if (env.FIREBASE_SERVICE_ACCOUNT_JSON) {
    const serviceAccount = readServiceAccount(env.FIREBASE_SERVICE_ACCOUNT_JSON, 'FIREBASE_SERVICE_ACCOUNT_JSON');
    app = admin.initializeApp({ credential: admin.credential.cert(serviceAccount) });
    return app;
  }

  if (env.FIREBASE_SERVICE_ACCOUNT_PATH) {
    const serviceAccount = readServiceAccount(
      fs.readFileSync(env.FIREBASE_SERVICE_ACCOUNT_PATH, { encoding: 'utf8' }),
      env.FIREBASE_SERVICE_ACCOUNT_PATH
    );
    app = admin.initializeApp({ credential: admin.credential.cert(serviceAccount) });
    return app;
  }

  // Application default credentials (GOOGLE_APPLICATION_CREDENTIALS)
  app = admin.initializeApp({
    credential: admin.credential.applicationDefault(),
    projectId: env.FIREBASE_PROJECT_ID
  });
  return app;
}

export function snapshotsEnabled(): boolean {
  return getEnv().SNAPSHOTS_ENABLED;
}

export function getFirestore() {
  initFirebaseApp();
  return admin.firestore();
}
