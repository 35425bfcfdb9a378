import { auth } from 'express-oauth2-jwt-bearer';

// OAuth2 JWT validation configuration for administrative routes
export const auth0Config = {
  audience: process.env.AUTH0_AUDIENCE || 'https://attendance.example.com',
  issuerBaseURL: process.env.AUTH0_ISSUER_BASE_URL || 'https://attendance.eu.auth0.com',
  tokenSigningAlg: 'RS256' as const,
};

// JWT validation middleware using express-oauth2-jwt-bearer
export const checkJwt = auth({
  audience: auth0Config.audience,
  issuerBaseURL: auth0Config.issuerBaseURL,
  tokenSigningAlg: auth0Config.tokenSigningAlg,
});
