export {
  type ContactForm,
  type ContactFormResult,
  contactFormBodySchema,
  contactFormSchema,
  formatSubmission,
  parseContactForm,
} from "./core/contact-form"
export {
  type CreateFormAppFn,
  createFormApp,
  type FormAppDeps,
  type FormAppOptions,
  type FormSender,
} from "./http/create-form-app"
export { CORS_HEADERS, originGuard } from "./http/origin-guard"
export { requestContext } from "./http/request-context"
export {
  createFormServer,
  FORM_DRAIN_TIMEOUT_MS,
  FormServer,
  type FormServerCollaborators,
  type FormServerDeps,
  type FormServerOptions,
  type FormServerState,
} from "./server/form-server"
export { type BoundServer, type Closeable, closeServer, type ListenFn, listen, type ListenOptions } from "./server/listen"
