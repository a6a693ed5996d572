// ============================================
// Shared Test Setup
// Runs before each test file via vitest setupFiles
// ============================================

import { vi } from 'vitest';

// Mock the logger to prevent pino transports and file system operations
vi.mock('../logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
  perfLogger: { info: vi.fn() },
  logEntitySpawned: vi.fn(),
  logEntityDespawned: vi.fn(),
  logDomainCreated: vi.fn(),
  logDomainRemoved: vi.fn(),
  logIntegrationFailure: vi.fn(),
  logEntityRestored: vi.fn(),
}));
