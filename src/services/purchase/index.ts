export { PurchaseService, PurchaseResult } from './purchase.service';
export { ReservationService, ReservationOptions, ReservationCompletion } from './reservation.service';
export { PurchaseController } from './purchase.controller';
export { createPurchaseRoutes } from './purchase.routes';
