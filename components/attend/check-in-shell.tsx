import { CalendarCheck } from 'lucide-react'

import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'

export function CheckInShell({
  title,
  description,
  children,
}: {
  title: string
  description?: React.ReactNode
  children: React.ReactNode
}) {
  return (
    <div className="flex min-h-screen items-center justify-center bg-gradient-to-br from-slate-900 to-slate-800 p-4">
      <Card className="w-full max-w-md">
        <CardHeader className="space-y-2">
          <div className="flex h-10 w-10 items-center justify-center rounded-xl bg-primary/15 text-primary">
            <CalendarCheck className="h-5 w-5" />
          </div>
          <CardTitle className="text-2xl font-bold">{title}</CardTitle>
          {description && <CardDescription>{description}</CardDescription>}
        </CardHeader>
        <CardContent>{children}</CardContent>
      </Card>
    </div>
  )
}

export function CheckInUnavailable({ message }: { message: string }) {
  return (
    <CheckInShell title="Link unavailable">
      <p className="rounded-xl border border-destructive/30 bg-destructive/10 p-3 text-sm text-destructive">{message}</p>
    </CheckInShell>
  )
}

export function CheckInConfirmation({ name, studentId, date, time }: { name: string; studentId: string; date: string; time: string }) {
  return (
    <div className="space-y-1 rounded-xl border border-success/30 bg-success/10 p-4 text-sm">
      <p className="font-semibold text-success">Attendance marked</p>
      <p>
        {name} ({studentId})
      </p>
      <p className="text-muted-foreground">
        {date} at {time}
      </p>
    </div>
  )
}
