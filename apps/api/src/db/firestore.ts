import { initializeApp, applicationDefault, cert, getApps } from 'firebase-admin/app';
import { getFirestore, Timestamp, type Firestore } from 'firebase-admin/firestore';
import type { Env } from '../env.js';

type FirebaseEnv = Pick<
  Env,
  'GOOGLE_APPLICATION_CREDENTIALS' | 'FIREBASE_PROJECT_ID' | 'FIREBASE_CLIENT_EMAIL' | 'FIREBASE_PRIVATE_KEY'
>;

function getFirebasePrivateKey(env: FirebaseEnv) {
  // Common pattern: store with escaped newlines in env
  return (env.FIREBASE_PRIVATE_KEY ?? '').replace(/\\n/g, '\n');
}

export function getDb(env: FirebaseEnv): Firestore {
  if (getApps().length === 0) {
    // If a service-account JSON path is provided, ADC will use it.
    // Prefer ADC to avoid accidentally using placeholder inline values.
    if (env.GOOGLE_APPLICATION_CREDENTIALS) {
      initializeApp({ credential: applicationDefault() });
    } else if (env.FIREBASE_PROJECT_ID && env.FIREBASE_CLIENT_EMAIL && env.FIREBASE_PRIVATE_KEY) {
      initializeApp({
        credential: cert({
          projectId: env.FIREBASE_PROJECT_ID,
          clientEmail: env.FIREBASE_CLIENT_EMAIL,
          privateKey: getFirebasePrivateKey(env)
        })
      });
    } else {
      initializeApp({ credential: applicationDefault() });
    }
  }
  return getFirestore();
}

export { Timestamp };
