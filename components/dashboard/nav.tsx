'use client'

import Link from 'next/link'
import { usePathname } from 'next/navigation'
import {
  CalendarCheck,
  ClipboardEdit,
  FileSpreadsheet,
  GraduationCap,
  LayoutDashboard,
  Link2,
  ListChecks,
  ScanLine,
  Settings,
  Users,
  type LucideIcon,
} from 'lucide-react'

import { Badge } from '@/components/ui/badge'
import type { CurrentUser, UserRole } from '@/lib/types'
import { cn } from '@/lib/utils'

type NavItem = {
  title: string
  href: string
  icon: LucideIcon
  roles: UserRole[]
}

const ALL_ROLES: UserRole[] = ['admin', 'teacher']

export const navItems: NavItem[] = [
  { title: 'Dashboard', href: '/dashboard', icon: LayoutDashboard, roles: ALL_ROLES },
  { title: 'Scan', href: '/dashboard/scan', icon: ScanLine, roles: ALL_ROLES },
  { title: 'Students', href: '/dashboard/students', icon: GraduationCap, roles: ALL_ROLES },
  { title: 'Manual entry', href: '/dashboard/manual', icon: ClipboardEdit, roles: ALL_ROLES },
  { title: 'Bulk entry', href: '/dashboard/bulk', icon: ListChecks, roles: ALL_ROLES },
  { title: 'Share links', href: '/dashboard/links', icon: Link2, roles: ALL_ROLES },
  { title: 'Records', href: '/dashboard/records', icon: FileSpreadsheet, roles: ALL_ROLES },
  { title: 'Teachers', href: '/dashboard/teachers', icon: Users, roles: ['admin'] },
  { title: 'Settings', href: '/dashboard/settings', icon: Settings, roles: ALL_ROLES },
]

interface DashboardNavProps {
  user: CurrentUser
}

export function DashboardNav({ user }: DashboardNavProps) {
  const pathname = usePathname()

  const filteredItems = navItems.filter((item) => item.roles.includes(user.role))

  return (
    <aside className="hidden w-64 shrink-0 flex-col border-r border-border/60 bg-card/60 md:flex">
      <div className="space-y-4 p-4">
        <div className="rounded-2xl border border-border/80 bg-muted/60 p-3">
          <div className="flex items-center gap-3">
            <div className="flex h-10 w-10 items-center justify-center rounded-xl bg-gradient-to-br from-primary to-accent-foreground text-primary-foreground shadow-sm">
              <CalendarCheck className="h-5 w-5" />
            </div>
            <div className="flex flex-col">
              <span className="text-sm font-semibold">Attendance</span>
              <span className="text-xs text-muted-foreground">{user.name || user.username}</span>
            </div>
          </div>
        </div>
        <Badge variant="secondary" className="w-fit capitalize">
          {user.role}
        </Badge>
      </div>

      <nav className="flex-1 px-3">
        <p className="px-3 pb-2 text-[11px] uppercase tracking-[0.28em] text-muted-foreground">Navigation</p>
        <ul className="space-y-1">
          {filteredItems.map((item) => {
            const Icon = item.icon
            const isActive =
              item.href === '/dashboard' ? pathname === item.href : pathname === item.href || pathname.startsWith(item.href + '/')
            return (
              <li key={item.href}>
                <Link
                  href={item.href}
                  className={cn(
                    'flex items-center gap-3 rounded-xl px-3 py-2 text-sm transition-colors hover:bg-muted',
                    isActive && 'bg-primary/10 font-medium text-primary'
                  )}
                >
                  <Icon className="h-4 w-4" />
                  <span>{item.title}</span>
                </Link>
              </li>
            )
          })}
        </ul>
      </nav>

      <div className="p-4">
        <div className="rounded-2xl border border-border bg-muted/60 p-3 text-xs text-muted-foreground">
          <div className="text-[11px] uppercase tracking-[0.24em]">Signed in</div>
          <div className="mt-2 text-sm font-medium text-foreground">{user.email}</div>
        </div>
      </div>
    </aside>
  )
}
