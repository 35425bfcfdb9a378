// Jest setup file
// Tests never reach MongoDB or the OAuth2 provider; models and the JWT
// middleware are mocked per test file.
process.env.NODE_ENV = 'test';
process.env.ATTENDANCE_TIMEZONE = 'UTC';
process.env.PRESENCE_API_KEY = 'test-api-key';
process.env.PRESENCE_SIGNING_SECRET = 'test-secret';
process.env.PRESENCE_HMAC_SKEW_SECONDS = '120';
process.env.AUTH0_AUDIENCE = 'https://attendance.example.test';
process.env.AUTH0_ISSUER_BASE_URL = 'https://issuer.example.test';
