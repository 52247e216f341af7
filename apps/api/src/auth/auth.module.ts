import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { FirebaseModule } from '../firebase/firebase.module';
import { FirebaseStrategy } from './strategies/firebase.strategy';

/**
 * AuthModule - bearer-token authentication.
 *
 * Registers the "firebase" Passport strategy; once AppModule imports this
 * module, any controller can use @UseGuards(FirebaseAuthGuard) or
 * @UseGuards(OptionalAuthGuard) without importing it.
 */
@Module({
  imports: [
    PassportModule.register({ defaultStrategy: 'firebase' }),
    FirebaseModule,
  ],
  providers: [FirebaseStrategy],
  exports: [PassportModule],
})
export class AuthModule {}
