import { redirect } from 'next/navigation'

import { PageIntro } from '@/components/dashboard/page-intro'
import { UnlockSection } from '@/components/dashboard/unlock-section'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { AuditLogTable } from '@/components/users/audit-log-table'
import { UsersManager } from '@/components/users/users-manager'
import { getCurrentUser } from '@/lib/auth'
import { isUnlocked } from '@/lib/guards'

export const metadata = {
  title: 'Teachers - Attendance Tracker',
}

export default async function TeachersPage() {
  const user = await getCurrentUser()
  if (!user) redirect('/auth')
  if (user.role !== 'admin') redirect('/dashboard')

  return (
    <div className="space-y-8">
      <PageIntro
        eyebrow="Access"
        title="Teachers & Admins"
        description="Create accounts, manage roles and lockouts, and review recent changes."
      />

      {isUnlocked(user, 'teachers') ? (
        <>
          <UsersManager currentUsername={user.username} />

          <Card>
            <CardHeader>
              <CardTitle>Activity log</CardTitle>
              <CardDescription>The latest changes to students, attendance, links and accounts.</CardDescription>
            </CardHeader>
            <CardContent>
              <AuditLogTable />
            </CardContent>
          </Card>
        </>
      ) : (
        <UnlockSection section="teachers" title="Teachers" />
      )}
    </div>
  )
}
