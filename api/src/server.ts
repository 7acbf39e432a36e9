import Fastify, { type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import rateLimit from '@fastify/rate-limit';
import type { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import type { ReservationEngine } from './engine.js';
import { AppError, TransientStorageError } from './errors.js';
import { registerBurstGuard, type BurstGuardOptions } from './rate-limit.js';
import {
  AutoAssignRequest,
  BookingReferenceParams,
  BookRequest,
  ErrorResponse,
  FlightParams,
  FlightSeatsResponse,
  HealthResponse,
  ManifestResponse,
  Passenger,
  PassengerParams,
  PassengerRequest,
  Reservation,
  ReservationList,
  ReservationsByEmailQuery,
  SearchQuery,
  SearchResponse
} from './schemas.js';
import type { FlightInstance, ManifestEntry, Reservation as ReservationRecord, Seat } from './types.js';

export type ServerOptions = {
  logLevel?: string;
  burstGuard?: BurstGuardOptions;
  /** Throws when a backing service is unreachable. */
  readiness?: () => Promise<void>;
};

const toFlightDto = (flight: FlightInstance) => ({
  flightId: flight.id,
  flightNumber: flight.flightNumber,
  aircraftId: flight.aircraftId,
  origin: flight.originCode,
  destination: flight.destinationCode,
  departureTime: flight.departureTime.toISOString(),
  arrivalTime: flight.arrivalTime.toISOString(),
  basePrice: flight.basePrice,
  status: flight.status
});

const toSeatDto = (seat: Pick<Seat, 'id' | 'code' | 'seatClass'>) => ({
  seatId: seat.id,
  code: seat.code,
  seatClass: seat.seatClass
});

const toReservationDto = (reservation: ReservationRecord) => ({
  bookingReference: reservation.bookingReference,
  passengerId: reservation.passengerId,
  flightId: reservation.flightId,
  seatId: reservation.seatId,
  ticketPrice: reservation.ticketPrice,
  status: reservation.status,
  paymentStatus: reservation.paymentStatus,
  createdAt: reservation.createdAt.toISOString()
});

const toManifestDto = (entry: ManifestEntry) => ({
  bookingReference: entry.bookingReference,
  passenger: {
    passengerId: entry.passenger.id,
    firstName: entry.passenger.firstName,
    lastName: entry.passenger.lastName,
    email: entry.passenger.email,
    passportNumber: entry.passenger.passportNumber
  },
  seat: entry.seat ? toSeatDto(entry.seat) : null,
  status: entry.status,
  paymentStatus: entry.paymentStatus
});

export const buildServer = (engine: ReservationEngine, options: ServerOptions = {}) => {
  const base = Fastify({ logger: options.logLevel ? { level: options.logLevel } : false });

  base.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      if (error instanceof TransientStorageError) {
        reply.header('Retry-After', '1');
      }
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply.code(error.statusCode).send({ error: { code: error.code, message: error.message } });
    }
    if (error.validation) {
      return reply.code(400).send({ error: { code: 'VALIDATION_ERROR', message: error.message } });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: { code: error.code ?? 'REQUEST_ERROR', message: error.message } });
    }
    request.log.error({ err: error }, 'unhandled error');
    return reply.code(500).send({ error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' } });
  });

  if (options.burstGuard) {
    registerBurstGuard(base, options.burstGuard);
  }

  const app = base.withTypeProvider<TypeBoxTypeProvider>();

  app.register(cors, {
    origin: true
  });

  app.register(swagger, {
    openapi: {
      info: {
        title: 'Seat Reservation API',
        version: '1.0.0'
      }
    }
  });

  app.register(swaggerUi, {
    routePrefix: '/docs'
  });

  app.register(rateLimit, {
    global: false,
    max: 60,
    timeWindow: '1 minute'
  });

  const errors = { 400: ErrorResponse, 404: ErrorResponse, 409: ErrorResponse };

  app.get('/flights/search', {
    schema: {
      querystring: SearchQuery,
      response: { 200: SearchResponse, 400: ErrorResponse }
    },
    config: {
      rateLimit: { max: 60, timeWindow: '1 minute' }
    }
  }, async (request) => {
    const { origin, destination, date } = request.query;
    const results = await engine.flights.search(origin, destination, date);
    return {
      flights: results.map((r) => ({
        flight: toFlightDto(r.flight),
        availableSeats: r.availableSeats,
        priceByClass: r.priceByClass
      }))
    };
  });

  app.get('/flights/:flightId/seats', {
    schema: {
      params: FlightParams,
      response: { 200: FlightSeatsResponse, 404: ErrorResponse }
    }
  }, async (request) => {
    const result = await engine.flights.seats(request.params.flightId);
    return {
      flight: toFlightDto(result.flight),
      availableSeats: result.availableSeats.map(toSeatDto),
      priceByClass: result.priceByClass
    };
  });

  app.get('/flights/:flightId/manifest', {
    schema: {
      params: FlightParams,
      response: { 200: ManifestResponse, 404: ErrorResponse }
    }
  }, async (request) => {
    const entries = await engine.flights.manifest(request.params.flightId);
    return { flightId: request.params.flightId, entries: entries.map(toManifestDto) };
  });

  app.post('/passengers', {
    schema: {
      body: PassengerRequest,
      response: { 200: Passenger, 400: ErrorResponse }
    }
  }, async (request) => {
    const passenger = await engine.passengers.resolve(request.body);
    return {
      passengerId: passenger.id,
      firstName: passenger.firstName,
      lastName: passenger.lastName,
      email: passenger.email
    };
  });

  app.get('/passengers/:passengerId/reservations', {
    schema: {
      params: PassengerParams,
      response: { 200: ReservationList }
    }
  }, async (request) => {
    const reservations = await engine.reservations.listFor(request.params.passengerId);
    return { reservations: reservations.map(toReservationDto) };
  });

  app.get('/reservations', {
    schema: {
      querystring: ReservationsByEmailQuery,
      response: { 200: ReservationList, 404: ErrorResponse }
    }
  }, async (request) => {
    const passenger = await engine.passengers.findByEmail(request.query.email);
    const reservations = await engine.reservations.listFor(passenger.id);
    return { reservations: reservations.map(toReservationDto) };
  });

  app.post('/reservations', {
    schema: {
      body: BookRequest,
      response: { 201: Reservation, ...errors }
    },
    config: {
      rateLimit: { max: 20, timeWindow: '1 minute' }
    }
  }, async (request, reply) => {
    const reservation = await engine.reservations.book(request.body);
    reply.code(201);
    return toReservationDto(reservation);
  });

  app.post('/reservations/auto-assign', {
    schema: {
      body: AutoAssignRequest,
      response: { 201: Reservation, ...errors }
    },
    config: {
      rateLimit: { max: 20, timeWindow: '1 minute' }
    }
  }, async (request, reply) => {
    const reservation = await engine.reservations.bookAnySeat(request.body);
    reply.code(201);
    return toReservationDto(reservation);
  });

  app.get('/reservations/:reference', {
    schema: {
      params: BookingReferenceParams,
      response: { 200: Reservation, 404: ErrorResponse }
    }
  }, async (request) => {
    return toReservationDto(await engine.reservations.lookup(request.params.reference));
  });

  app.post('/reservations/:reference/cancel', {
    schema: {
      params: BookingReferenceParams,
      response: { 200: Reservation, ...errors }
    }
  }, async (request) => {
    return toReservationDto(await engine.reservations.cancel(request.params.reference));
  });

  app.post('/reservations/:reference/check-in', {
    schema: {
      params: BookingReferenceParams,
      response: { 200: Reservation, ...errors }
    }
  }, async (request) => {
    return toReservationDto(await engine.reservations.checkIn(request.params.reference));
  });

  app.get('/health', { schema: { response: { 200: HealthResponse } } }, async () => ({ status: 'ok' as const }));

  app.get('/ready', {
    schema: { response: { 200: HealthResponse, 503: HealthResponse } }
  }, async (request, reply) => {
    if (options.readiness) {
      try {
        await options.readiness();
      } catch (err) {
        request.log.warn({ err }, 'readiness check failed');
        return reply.code(503).send({ status: 'unavailable' });
      }
    }
    return { status: 'ok' as const };
  });

  return app;
};
