import { z } from 'zod';
import type { Logger, UserRecord, UserRepository } from '../../ports';
import { NotFoundError, UnauthorizedError } from '../../errors';
import { secretsMatch } from '../../domain/circulation';

const nonBlank = z.string().trim().min(1);

const RegistrationSchema = z.object({
  id: nonBlank,
  displayName: nonBlank,
  secret: nonBlank,
});

// Registration and secret changes: plain upserts on the student directory,
// kept apart from the lending state machine
export class AccountService {
  constructor(
    private readonly users: UserRepository,
    private readonly logger: Logger,
  ) {}

  // Throws a ZodError when any field is blank
  async register(studentId: string, displayName: string, secret: string): Promise<UserRecord> {
    const registration = RegistrationSchema.parse({ id: studentId, displayName, secret });
    const user = await this.users.upsert(registration);
    this.logger.info({ studentId: user.id }, 'Student registered');
    return user;
  }

  async changeSecret(studentId: string, currentSecret: string, nextSecret: string): Promise<void> {
    const user = await this.users.find(studentId);
    if (!user) {
      throw new NotFoundError(`Student ${studentId} not found`);
    }
    if (!secretsMatch(currentSecret, user.secret)) {
      throw new UnauthorizedError(`Credentials rejected for student ${studentId}`);
    }

    await this.users.updateSecret(studentId, nonBlank.parse(nextSecret));
    this.logger.info({ studentId }, 'Student secret changed');
  }
}
