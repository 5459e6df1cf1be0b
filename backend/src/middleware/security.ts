import helmet from 'helmet';

/**
 * Security Headers Middleware
 *
 * The service only answers JSON and plain-text webhook challenges, so nothing
 * is allowed to load from its responses.
 */
export const getHelmetConfig = (production: boolean) =>
  helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    // Strict Transport Security only where TLS terminates in front of us
    hsts: production
      ? {
          maxAge: 31536000, // 1 year
          includeSubDomains: true,
        }
      : false,
    frameguard: {
      action: 'deny',
    },
    noSniff: true,
    hidePoweredBy: true,
    crossOriginResourcePolicy: { policy: 'same-origin' },
  });
