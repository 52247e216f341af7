// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';

// ── Guards (for use in other feature modules) ───────────────
export { FirebaseAuthGuard } from './guards/firebase-auth.guard';
export { OptionalAuthGuard } from './guards/optional-auth.guard';

// ── Decorators (for use in other feature modules) ───────────
export { CurrentUser, OptionalUser } from './decorators/current-user.decorator';

// ── Ports & interfaces ──────────────────────────────────────
export { TokenVerifier } from './token-verifier';
export type {
  RequestUser,
  AuthenticatedRequest,
  OptionallyAuthenticatedRequest,
} from './interfaces/request-user.interface';
