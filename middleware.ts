import { type NextRequest, NextResponse } from 'next/server'

import { SESSION_COOKIE } from '@/lib/types'

const PUBLIC_PATHS = ['/auth', '/reset-password']
const PUBLIC_PREFIXES = ['/attend/']

export function isPublicPath(pathname: string) {
  return PUBLIC_PATHS.includes(pathname) || PUBLIC_PREFIXES.some((prefix) => pathname.startsWith(prefix))
}

// Only checks that a session cookie is present; pages and actions validate it against the database
export function middleware(request: NextRequest) {
  const { pathname } = request.nextUrl

  if (isPublicPath(pathname) || request.cookies.has(SESSION_COOKIE)) {
    return NextResponse.next()
  }

  const redirectUrl = request.nextUrl.clone()
  redirectUrl.pathname = '/auth'
  redirectUrl.search = ''
  redirectUrl.searchParams.set('redirect', pathname)
  return NextResponse.redirect(redirectUrl)
}

export const config = {
  matcher: [
    // Run middleware on all routes except:
    '/((?!api|_next/static|_next/image|favicon.ico|public).*)',
  ],
}
