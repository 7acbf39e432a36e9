export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string) {
    super('NOT_FOUND', id ? `${entity} ${id} not found` : `${entity} not found`, 404);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string = 'Validation failed') {
    super('VALIDATION_ERROR', message, 400);
    this.name = 'ValidationError';
  }
}

/** Lost a claim race or nothing left in the requested class. Re-read availability and retry. */
export class SeatUnavailableError extends AppError {
  constructor(
    public flightId: string,
    public seat: string
  ) {
    super('SEAT_UNAVAILABLE', `Seat ${seat} is not available on flight ${flightId}`, 409);
    this.name = 'SeatUnavailableError';
  }
}

export class FlightNotBookableError extends AppError {
  constructor(flightId: string, status: string) {
    super('FLIGHT_NOT_BOOKABLE', `Flight ${flightId} is ${status} and cannot be booked`, 409);
    this.name = 'FlightNotBookableError';
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string, detail?: string) {
    super(
      'INVALID_TRANSITION',
      detail ? `Cannot move reservation from ${from} to ${to}: ${detail}` : `Cannot move reservation from ${from} to ${to}`,
      409
    );
    this.name = 'InvalidTransitionError';
  }
}

export class CancellationClosedError extends AppError {
  constructor(bookingReference: string) {
    super('CANCELLATION_CLOSED', `Reservation ${bookingReference} can no longer be cancelled: the flight has departed`, 409);
    this.name = 'CancellationClosedError';
  }
}

/** Fatal: the reference generator ran out of attempts. Usually means the random source is broken. */
export class ReferenceExhaustedError extends AppError {
  constructor(attempts: number) {
    super('REFERENCE_EXHAUSTED', `No unused booking reference found after ${attempts} attempts`, 500);
    this.name = 'ReferenceExhaustedError';
  }
}

export class TransientStorageError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super('TRANSIENT_STORAGE', message, 503, options);
    this.name = 'TransientStorageError';
  }
}
