import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { App, cert, getApps, initializeApp } from 'firebase-admin/app';
import { FirebaseNotConfiguredException } from './firebase.exceptions';

/**
 * Process-wide Firebase Admin app handle.
 *
 * Initialised lazily on first use so the API boots (and serves dev tokens,
 * health checks, templates) without credentials. Concurrent callers share
 * one initialisation; a failed one is retried on the next call.
 */
@Injectable()
export class FirebaseAppProvider {
  private readonly logger = new Logger(FirebaseAppProvider.name);
  private app: Promise<App> | null = null;

  constructor(private readonly configService: ConfigService) {}

  getApp(): Promise<App> {
    if (!this.app) {
      this.app = this.initialize().catch((error: unknown) => {
        this.app = null;
        throw error;
      });
    }
    return this.app;
  }

  private async initialize(): Promise<App> {
    const existing = getApps();
    if (existing.length > 0) {
      return existing[0];
    }

    const projectId = this.configService.get<string>('FIREBASE_PROJECT_ID');
    const clientEmail = this.configService.get<string>('FIREBASE_CLIENT_EMAIL');
    const privateKey = this.configService.get<string>('FIREBASE_PRIVATE_KEY');

    if (!projectId || !clientEmail || !privateKey) {
      const required: Record<string, string | undefined> = {
        FIREBASE_PROJECT_ID: projectId,
        FIREBASE_CLIENT_EMAIL: clientEmail,
        FIREBASE_PRIVATE_KEY: privateKey,
      };
      const missing = Object.entries(required)
        .filter(([, value]) => !value)
        .map(([key]) => key);
      throw new FirebaseNotConfiguredException(missing);
    }

    const app = initializeApp({
      credential: cert({
        projectId,
        clientEmail,
        // .env files keep the PEM on one line with literal \n
        privateKey: privateKey.replace(/\\n/g, '\n'),
      }),
    });
    this.logger.log(`Firebase Admin initialised for project "${projectId}"`);
    return app;
  }
}
