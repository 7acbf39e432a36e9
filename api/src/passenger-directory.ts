import { NotFoundError, ValidationError } from './errors.js';
import type { Logger } from './logger.js';
import type { Store } from './store.js';
import type { NewPassenger, Passenger } from './types.js';

export type PassengerProfile = Pick<NewPassenger, 'firstName' | 'lastName' | 'email'> &
  Partial<Omit<NewPassenger, 'firstName' | 'lastName' | 'email'>>;

/** Resolves passenger identities by email. Details of an existing passenger are never overwritten. */
export class PassengerDirectory {
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'passengers' });
  }

  async resolve(profile: PassengerProfile): Promise<Passenger> {
    const email = profile.email.trim().toLowerCase();
    if (!profile.firstName.trim() || !profile.lastName.trim() || !email) {
      throw new ValidationError('firstName, lastName and email are required');
    }
    const passenger = await this.store.transaction((session) =>
      session.insertPassengerIfAbsent({
        firstName: profile.firstName.trim(),
        lastName: profile.lastName.trim(),
        email,
        phone: profile.phone ?? null,
        dateOfBirth: profile.dateOfBirth ?? null,
        passportNumber: profile.passportNumber ?? null,
        nationality: profile.nationality ?? null
      })
    );
    this.log.debug({ passengerId: passenger.id }, 'passenger resolved');
    return passenger;
  }

  async get(passengerId: string): Promise<Passenger> {
    const passenger = await this.store.findPassenger(passengerId);
    if (!passenger) {
      throw new NotFoundError('Passenger', passengerId);
    }
    return passenger;
  }

  async findByEmail(email: string): Promise<Passenger> {
    const passenger = await this.store.findPassengerByEmail(email.trim().toLowerCase());
    if (!passenger) {
      throw new NotFoundError('Passenger', email);
    }
    return passenger;
  }
}
