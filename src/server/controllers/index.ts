export { createHealthController, createInfoController } from './health.controller.js';
export type { ServiceInfo } from './health.controller.js';
export { createLoginController, loginStatusForKind } from './login.controller.js';
export { createCookiesController } from './cookies.controller.js';
export type { CookiesController } from './cookies.controller.js';
export { createCookieFormController, renderCookieForm, escapeHtml } from './cookie-form.controller.js';
export type { CookieFormController } from './cookie-form.controller.js';
