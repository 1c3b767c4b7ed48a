import * as admin from "firebase-admin";
import { getFirestore } from "firebase-admin/firestore";

export function getAdminApp() {
  if (admin.apps.length) return admin.app();
  return admin.initializeApp();
}

export function getDb() {
  return getFirestore(getAdminApp());
}
