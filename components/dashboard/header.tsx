'use client'

import Link from 'next/link'
import { usePathname, useRouter } from 'next/navigation'
import { LogOut } from 'lucide-react'
import { toast } from 'sonner'

import { Badge } from '@/components/ui/badge'
import { Button } from '@/components/ui/button'
import { signOut } from '@/lib/auth'
import type { CurrentUser } from '@/lib/types'
import { cn } from '@/lib/utils'

import { navItems } from './nav'

interface DashboardHeaderProps {
  user: CurrentUser
}

export function DashboardHeader({ user }: DashboardHeaderProps) {
  const router = useRouter()
  const pathname = usePathname()

  const pageTitle = (() => {
    if (pathname === '/dashboard') return 'Overview'
    const match = navItems.find((item) => item.href !== '/dashboard' && pathname.startsWith(item.href))
    return match?.title ?? 'Dashboard'
  })()

  const handleSignOut = async () => {
    const result = await signOut()
    if (!result.success) {
      toast.error('Failed to sign out', { description: result.error.message })
      return
    }
    toast.success('Signed out successfully')
    router.push('/auth')
  }

  const initials = (user.name || user.username)
    .split(/\s+/)
    .map((part) => part.charAt(0))
    .join('')
    .slice(0, 2)
    .toUpperCase()

  return (
    <header className="sticky top-0 z-40 border-b border-border/60 bg-background/80 backdrop-blur">
      <div className="flex h-16 items-center justify-between px-4 sm:px-6 lg:px-10">
        <div>
          <p className="text-[11px] uppercase tracking-[0.28em] text-muted-foreground">Attendance Tracker</p>
          <h2 className="font-display text-2xl font-semibold">{pageTitle}</h2>
        </div>

        <div className="flex items-center gap-4">
          <Badge variant="outline" className="hidden border-primary/30 capitalize text-primary sm:inline-flex">
            {user.role}
          </Badge>
          <div className="flex items-center gap-2">
            <div className="flex h-9 w-9 items-center justify-center rounded-full bg-gradient-to-br from-primary to-accent-foreground text-sm font-semibold text-primary-foreground">
              {initials}
            </div>
            <p className="hidden text-sm font-medium sm:block">{user.name || user.username}</p>
          </div>
          <Button variant="ghost" size="sm" onClick={() => void handleSignOut()} className="text-destructive">
            <LogOut className="h-4 w-4" />
            <span className="hidden sm:inline">Sign out</span>
          </Button>
        </div>
      </div>
      <nav className="flex gap-1 overflow-x-auto px-4 pb-2 md:hidden">
        {navItems
          .filter((item) => item.roles.includes(user.role))
          .map((item) => (
            <Link
              key={item.href}
              href={item.href}
              className={cn(
                'whitespace-nowrap rounded-lg px-3 py-1 text-xs',
                pathname === item.href ? 'bg-primary/10 text-primary' : 'text-muted-foreground'
              )}
            >
              {item.title}
            </Link>
          ))}
      </nav>
    </header>
  )
}
