import { format, parseISO } from 'date-fns'
import { CalendarCheck, GraduationCap, Percent, UserCheck } from 'lucide-react'
import { redirect } from 'next/navigation'

import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { getCurrentUser } from '@/lib/auth'
import { createServiceContext } from '@/lib/guards'
import { getDashboardSummary, type DashboardSummary } from '@/lib/services/attendance'

export const metadata = {
  title: 'Dashboard - Attendance Tracker',
}

export default async function DashboardPage() {
  const user = await getCurrentUser()
  if (!user) redirect('/auth')

  let summary: DashboardSummary | null = null
  try {
    summary = await getDashboardSummary(await createServiceContext(user))
  } catch (error) {
    console.error('Dashboard summary error:', error)
  }

  if (!summary) {
    return (
      <Card>
        <CardHeader>
          <CardTitle>Dashboard unavailable</CardTitle>
          <CardDescription>The attendance summary could not be loaded. Try again shortly.</CardDescription>
        </CardHeader>
      </Card>
    )
  }

  const rate = summary.recordsToday === 0 ? 0 : Math.round((summary.presentToday / summary.recordsToday) * 1000) / 10
  const busiest = Math.max(1, ...summary.lastSevenDays.map((day) => day.total))

  return (
    <div className="space-y-8">
      <section className="rounded-3xl border border-border/60 bg-card/80 p-6 shadow-[0_18px_40px_rgba(15,23,42,0.08)]">
        <p className="text-xs uppercase tracking-[0.2em] text-muted-foreground">
          {format(parseISO(summary.today), 'EEEE, d MMMM yyyy')}
        </p>
        <h1 className="mt-2 font-display text-4xl font-semibold">Welcome, {user.name || user.username}</h1>
        <p className="mt-2 text-muted-foreground">
          {user.role === 'admin' ? 'Figures cover every teacher.' : 'Figures cover the students you manage.'}
        </p>
      </section>

      <section className="grid gap-4 sm:grid-cols-2 xl:grid-cols-4">
        <StatCard label="Students" value={summary.totalStudents} sub="on your roster" icon={GraduationCap} />
        <StatCard label="Marked Today" value={summary.recordsToday} sub="attendance records" icon={CalendarCheck} />
        <StatCard label="Present Today" value={summary.presentToday} sub="marked present" icon={UserCheck} />
        <StatCard label="Rate Today" value={`${rate}%`} sub="present of marked" icon={Percent} />
      </section>

      <Card>
        <CardHeader>
          <CardTitle>Last 7 days</CardTitle>
          <CardDescription>Present against all marks per day</CardDescription>
        </CardHeader>
        <CardContent className="space-y-3">
          {summary.lastSevenDays.map((day) => (
            <div key={day.date} className="flex items-center gap-4 text-sm">
              <div className="w-24 shrink-0 text-muted-foreground">{format(parseISO(day.date), 'EEE d MMM')}</div>
              <div className="h-3 flex-1 overflow-hidden rounded-full bg-muted">
                <div
                  className="h-full rounded-full bg-primary"
                  style={{ width: `${(day.present / busiest) * 100}%` }}
                />
              </div>
              <div className="w-16 shrink-0 text-right font-medium">
                {day.present}/{day.total}
              </div>
            </div>
          ))}
        </CardContent>
      </Card>
    </div>
  )
}

function StatCard({
  label,
  value,
  sub,
  icon: Icon,
}: {
  label: string
  value: string | number
  sub: string
  icon: React.ComponentType<{ className?: string }>
}) {
  return (
    <div className="rounded-2xl border border-border/60 bg-card/80 p-5 shadow-[0_12px_28px_rgba(15,23,42,0.08)]">
      <div className="flex items-start justify-between">
        <div>
          <p className="text-xs uppercase tracking-[0.2em] text-muted-foreground">{label}</p>
          <p className="mt-2 text-2xl font-semibold">{value}</p>
          <p className="mt-1 text-xs text-muted-foreground">{sub}</p>
        </div>
        <div className="flex h-10 w-10 items-center justify-center rounded-2xl bg-accent/70 text-foreground">
          <Icon className="h-5 w-5" />
        </div>
      </div>
    </div>
  )
}
