import { redirect } from 'next/navigation'

import { BulkEntryManager } from '@/components/attendance/bulk-entry-manager'
import { PageIntro } from '@/components/dashboard/page-intro'
import { UnlockSection } from '@/components/dashboard/unlock-section'
import { getCurrentUser } from '@/lib/auth'
import { isUnlocked } from '@/lib/guards'

export const metadata = {
  title: 'Bulk Entry - Attendance Tracker',
}

export default async function BulkEntryPage() {
  const user = await getCurrentUser()
  if (!user) redirect('/auth')

  return (
    <div className="space-y-8">
      <PageIntro
        eyebrow="Daily Operations"
        title="Bulk Entry"
        description="Mark a whole roster for one day. Everyone starts present; untick the absent students."
      />

      {isUnlocked(user, 'bulk') ? <BulkEntryManager /> : <UnlockSection section="bulk" title="Bulk Entry" />}
    </div>
  )
}
