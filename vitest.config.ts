// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { defineConfig } from 'vitest/config'

export default defineConfig({
  esbuild: {
    target: 'es2022',
  },
  test: {
    globalSetup: ['__tests__/test-server.ts'],
    include: ['__tests__/**/*.test.ts'],
    environment: 'node',
  },
})
