// SPDX-License-Identifier: Apache-2.0
import '@testing-library/jest-dom/vitest'
import { cleanup } from '@testing-library/react'
import { afterEach } from 'vitest'

afterEach(() => {
  cleanup()
  // Plugin tests run under the node environment
  if (typeof window !== 'undefined') window.localStorage.clear()
})
