import { Type } from '@sinclair/typebox';

export const SeatClass = Type.Union([Type.Literal('business'), Type.Literal('economy')]);

export const FlightStatus = Type.Union([
  Type.Literal('scheduled'),
  Type.Literal('boarding'),
  Type.Literal('departed'),
  Type.Literal('arrived'),
  Type.Literal('cancelled'),
  Type.Literal('delayed')
]);

export const ReservationStatus = Type.Union([
  Type.Literal('confirmed'),
  Type.Literal('cancelled'),
  Type.Literal('checked_in'),
  Type.Literal('completed')
]);

export const PaymentStatus = Type.Union([Type.Literal('pending'), Type.Literal('paid'), Type.Literal('refunded')]);

export const ErrorResponse = Type.Object({
  error: Type.Object({
    code: Type.String(),
    message: Type.String()
  })
});

export const Seat = Type.Object({
  seatId: Type.String(),
  code: Type.String(),
  seatClass: SeatClass
});

export const PriceByClass = Type.Object({
  business: Type.Number(),
  economy: Type.Number()
});

export const Flight = Type.Object({
  flightId: Type.String(),
  flightNumber: Type.String(),
  aircraftId: Type.String(),
  origin: Type.String(),
  destination: Type.String(),
  departureTime: Type.String({ format: 'date-time' }),
  arrivalTime: Type.String({ format: 'date-time' }),
  basePrice: Type.Number(),
  status: FlightStatus
});

export const SearchQuery = Type.Object({
  origin: Type.String({ minLength: 3, maxLength: 4 }),
  destination: Type.String({ minLength: 3, maxLength: 4 }),
  date: Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' })
});

export const SearchResponse = Type.Object({
  flights: Type.Array(
    Type.Object({
      flight: Flight,
      availableSeats: Type.Integer(),
      priceByClass: PriceByClass
    })
  )
});

export const FlightSeatsResponse = Type.Object({
  flight: Flight,
  availableSeats: Type.Array(Seat),
  priceByClass: PriceByClass
});

export const Reservation = Type.Object({
  bookingReference: Type.String(),
  passengerId: Type.String(),
  flightId: Type.String(),
  seatId: Type.Union([Type.String(), Type.Null()]),
  ticketPrice: Type.Number(),
  status: ReservationStatus,
  paymentStatus: PaymentStatus,
  createdAt: Type.String({ format: 'date-time' })
});

export const ReservationList = Type.Object({
  reservations: Type.Array(Reservation)
});

export const ReservationsByEmailQuery = Type.Object({
  email: Type.String({ format: 'email' })
});

export const BookRequest = Type.Object({
  passengerId: Type.String({ minLength: 1 }),
  flightId: Type.String({ minLength: 1 }),
  seatId: Type.String({ minLength: 1 }),
  price: Type.Number({ minimum: 0 })
});

export const AutoAssignRequest = Type.Object({
  passengerId: Type.String({ minLength: 1 }),
  flightId: Type.String({ minLength: 1 }),
  seatClass: SeatClass
});

export const BookingReferenceParams = Type.Object({
  reference: Type.String({ pattern: '^[A-Z0-9]{8}$' })
});

export const FlightParams = Type.Object({
  flightId: Type.String()
});

export const PassengerParams = Type.Object({
  passengerId: Type.String()
});

export const PassengerRequest = Type.Object({
  firstName: Type.String({ minLength: 1 }),
  lastName: Type.String({ minLength: 1 }),
  email: Type.String({ format: 'email' }),
  phone: Type.Optional(Type.String()),
  dateOfBirth: Type.Optional(Type.String({ format: 'date' })),
  passportNumber: Type.Optional(Type.String()),
  nationality: Type.Optional(Type.String())
});

export const Passenger = Type.Object({
  passengerId: Type.String(),
  firstName: Type.String(),
  lastName: Type.String(),
  email: Type.String()
});

export const ManifestResponse = Type.Object({
  flightId: Type.String(),
  entries: Type.Array(
    Type.Object({
      bookingReference: Type.String(),
      passenger: Type.Object({
        passengerId: Type.String(),
        firstName: Type.String(),
        lastName: Type.String(),
        email: Type.String(),
        passportNumber: Type.Union([Type.String(), Type.Null()])
      }),
      seat: Type.Union([Seat, Type.Null()]),
      status: ReservationStatus,
      paymentStatus: PaymentStatus
    })
  )
});

export const HealthResponse = Type.Object({
  status: Type.Union([Type.Literal('ok'), Type.Literal('unavailable')])
});
