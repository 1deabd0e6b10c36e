/**
 * Firebase Admin SDK initialization for the pipeline.
 *
 * The service account key may be given as a file path or as inline JSON;
 * without one, application default credentials are used.
 */

import { existsSync, readFileSync } from 'fs';
import { cert, getApps, initializeApp, type App, type Credential } from 'firebase-admin/app';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';
import { logger } from '../logger.js';
import type { PipelineConfig } from '../config.js';

let adminApp: App | null = null;

const loadCredential = (keySource: string): Credential => {
  // Try as file path first, then as JSON string
  if (existsSync(keySource)) {
    return cert(JSON.parse(readFileSync(keySource, 'utf-8')));
  }
  try {
    return cert(JSON.parse(keySource));
  } catch (err) {
    throw new Error('FIREBASE_SERVICE_ACCOUNT_KEY is neither a valid file path nor valid JSON', { cause: err });
  }
};

/**
 * Initialize Firebase Admin SDK (idempotent).
 */
export function initFirebase(config: PipelineConfig): App {
  if (adminApp) return adminApp;

  const [existing] = getApps();
  if (existing) {
    adminApp = existing;
    return adminApp;
  }

  adminApp = config.firebaseServiceAccountKey
    ? initializeApp({
        credential: loadCredential(config.firebaseServiceAccountKey),
        projectId: config.gcpProjectId,
      })
    : initializeApp({ projectId: config.gcpProjectId });

  logger.info({ projectId: config.gcpProjectId }, 'Firebase Admin SDK initialized');
  return adminApp;
}

export function getPipelineFirestore(config: PipelineConfig): Firestore {
  return getFirestore(initFirebase(config));
}
