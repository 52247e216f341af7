import { Global, Module } from '@nestjs/common';
import { FirebaseAppProvider } from './firebase-app.provider';
import { FirebaseTokenVerifier } from './firebase-token-verifier';
import { TokenVerifier } from '../auth/token-verifier';

/**
 * Global so guards in any feature module can resolve TokenVerifier.
 */
@Global()
@Module({
  providers: [
    FirebaseAppProvider,
    { provide: TokenVerifier, useClass: FirebaseTokenVerifier },
  ],
  exports: [FirebaseAppProvider, TokenVerifier],
})
export class FirebaseModule {}
