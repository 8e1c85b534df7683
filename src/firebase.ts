import admin from "firebase-admin";
import fs from "node:fs";
import { z } from "zod";

const serviceAccountSchema = z.object({
  project_id: z.string(),
  client_email: z.string(),
  private_key: z.string(),
});

export interface FirebaseCredentials {
  serviceAccountJson?: string;
  credentialsPath?: string;
}

function initializeFirebaseAdmin(credentials: FirebaseCredentials): admin.app.App | null {
  if (admin.apps.length) {
    return admin.app();
  }

  let credential: admin.credential.Credential;

  if (credentials.serviceAccountJson) {
    const parsed = serviceAccountSchema.safeParse(JSON.parse(credentials.serviceAccountJson));
    if (!parsed.success) {
      throw new Error("FIREBASE_SERVICE_ACCOUNT_JSON is not a service account key");
    }
    credential = admin.credential.cert({
      projectId: parsed.data.project_id,
      clientEmail: parsed.data.client_email,
      privateKey: parsed.data.private_key,
    });
  } else if (credentials.credentialsPath) {
    const p = credentials.credentialsPath;
    if (!fs.existsSync(p)) {
      throw new Error(`GOOGLE_APPLICATION_CREDENTIALS not found at: ${p}`);
    }
    credential = admin.credential.cert(p);
  } else {
    // No Firebase configured; snapshots go to the filesystem
    return null;
  }

  return admin.initializeApp({ credential });
}

export function connectFirestore(credentials: FirebaseCredentials): admin.firestore.Firestore | null {
  const app = initializeFirebaseAdmin(credentials);
  return app ? admin.firestore(app) : null;
}
