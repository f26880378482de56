const DEFAULT_STUN_URLS = [
  'stun:stun.l.google.com:19302',
  'stun:stun1.l.google.com:19302',
  'stun:stun2.l.google.com:19302',
];

const parseList = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) {
    return fallback;
  }
  const entries = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return entries.length > 0 ? entries : fallback;
};

export default () => ({
  port: parseInt(process.env.PORT || '3000', 10),
  cors: {
    origin: process.env.CORS_ORIGIN || 'http://localhost:3001',
  },
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'password',
    database: process.env.DB_NAME || 'callwire',
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.DB_LOGGING === 'true',
  },
  jwt: {
    secret: process.env.JWT_SECRET || 'your-secret-key',
  },
  calls: {
    ringTimeoutSeconds: parseInt(
      process.env.CALL_RING_TIMEOUT_SECONDS || '60',
      10,
    ),
    invitationTtlSeconds: parseInt(
      process.env.CALL_INVITATION_TTL_SECONDS || '120',
      10,
    ),
    sweepIntervalMs: parseInt(process.env.CALL_SWEEP_INTERVAL_MS || '15000', 10),
  },
  webrtc: {
    stunUrls: parseList(process.env.STUN_SERVER_URLS, DEFAULT_STUN_URLS),
    turnUrl: process.env.TURN_SERVER_URL || '',
    turnUsername: process.env.TURN_SERVER_USERNAME || '',
    turnCredential: process.env.TURN_SERVER_CREDENTIAL || '',
    iceTransportPolicy: process.env.ICE_TRANSPORT_POLICY || 'all',
  },
});
