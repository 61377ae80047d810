/**
 * Routes Index
 *
 * Mounts the info, health, login and cookie endpoints on one router.
 */

import express, { Router } from 'express';
import { LoginCoordinator } from '../../core/login-coordinator.js';
import {
  ServiceInfo,
  createCookieFormController,
  createCookiesController,
  createHealthController,
  createInfoController,
  createLoginController,
} from '../controllers/index.js';

export const ENDPOINTS = [
  'GET /health',
  'POST /login',
  'POST /login-form',
  'GET /cookies',
  'POST /cookies',
  'GET /cookies/form',
  'POST /cookies/form',
];

export interface RouteDependencies {
  coordinator: LoginCoordinator;
  manualCookieDomain: string;
  info: ServiceInfo;
}

export function createRouter(deps: RouteDependencies): Router {
  const router = Router();
  const login = createLoginController(deps.coordinator);
  const cookies = createCookiesController(deps.coordinator, deps.manualCookieDomain);
  const cookieForm = createCookieFormController(deps.coordinator, deps.manualCookieDomain, deps.info);

  // GET / - Service info
  router.get('/', createInfoController(deps.info, ENDPOINTS));

  // GET /health - Liveness check
  router.get('/health', createHealthController(deps.info));

  // POST /login - JSON credentials
  router.post('/login', express.json(), login);

  // POST /login-form - urlencoded credentials
  router.post('/login-form', express.urlencoded({ extended: false }), login);

  // POST /cookies - Manual cookie submission, JSON or form
  router.post('/cookies', express.json(), express.urlencoded({ extended: false }), cookies.submit);

  // GET /cookies - Current cookie record
  router.get('/cookies', cookies.current);

  // GET /cookies/form - Paste page for manual cookies
  router.get('/cookies/form', cookieForm.page);

  // POST /cookies/form - Paste page submission, redirects back to the page
  router.post('/cookies/form', express.urlencoded({ extended: false }), cookieForm.submit);

  return router;
}
