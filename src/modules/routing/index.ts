/**
 * =============================================================================
 * ROUTING MODULE
 * =============================================================================
 *
 * Plans a delivery run: resolves the origin and stops to coordinates, orders
 * them with the optimizer, and renders one Google Maps link per segment.
 * =============================================================================
 */

export * from './routing.schema';
export { RoutingService, routingService } from './routing.service';
export { buildGoogleMapsDirectionsLink } from './map-link';
export { createRoutingRouter } from './routing.routes';
