import { describe, expect, it } from 'vitest'

import { isPublicPath } from './middleware'

describe('isPublicPath', () => {
  it('leaves sign-in and check-in pages open', () => {
    expect(isPublicPath('/auth')).toBe(true)
    expect(isPublicPath('/reset-password')).toBe(true)
    expect(isPublicPath('/attend/session/abc123')).toBe(true)
    expect(isPublicPath('/attend/student/abc123')).toBe(true)
  })

  it('protects everything else', () => {
    expect(isPublicPath('/')).toBe(false)
    expect(isPublicPath('/dashboard')).toBe(false)
    expect(isPublicPath('/attend')).toBe(false)
    expect(isPublicPath('/authx')).toBe(false)
  })
})
