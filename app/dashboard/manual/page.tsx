import { redirect } from 'next/navigation'

import { ManualEntryManager } from '@/components/attendance/manual-entry-manager'
import { PageIntro } from '@/components/dashboard/page-intro'
import { UnlockSection } from '@/components/dashboard/unlock-section'
import { getCurrentUser } from '@/lib/auth'
import { isUnlocked } from '@/lib/guards'

export const metadata = {
  title: 'Manual Entry - Attendance Tracker',
}

export default async function ManualEntryPage() {
  const user = await getCurrentUser()
  if (!user) redirect('/auth')

  return (
    <div className="space-y-8">
      <PageIntro
        eyebrow="Daily Operations"
        title="Manual Entry"
        description="Mark a single student for any day, or review a day and correct its records."
      />

      {isUnlocked(user, 'manual') ? <ManualEntryManager /> : <UnlockSection section="manual" title="Manual Entry" />}
    </div>
  )
}
