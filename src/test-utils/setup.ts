import { beforeEach, vi } from 'vitest'

// Global test setup
beforeEach(() => {
  vi.clearAllMocks()

  // Debug output depends on the environment; keep tests deterministic
  delete process.env.LIVEPREVIEW_DEBUG
})
