/**
 * API Routes
 */

export { createHealthRouter, type HealthRouteOptions } from './health.js';
export { createApplicantRouter } from './applicants.js';
