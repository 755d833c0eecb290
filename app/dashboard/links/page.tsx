import { redirect } from 'next/navigation'

import { PageIntro } from '@/components/dashboard/page-intro'
import { UnlockSection } from '@/components/dashboard/unlock-section'
import { LinksManager } from '@/components/links/links-manager'
import { getCurrentUser } from '@/lib/auth'
import { isUnlocked } from '@/lib/guards'

export const metadata = {
  title: 'Share Links - Attendance Tracker',
}

export default async function LinksPage() {
  const user = await getCurrentUser()
  if (!user) redirect('/auth')

  return (
    <div className="space-y-8">
      <PageIntro
        eyebrow="Self Check-in"
        title="Share Links"
        description="Session links let any student on your roster check in; personal links belong to one student."
      />

      {isUnlocked(user, 'links') ? <LinksManager /> : <UnlockSection section="links" title="Share Links" />}
    </div>
  )
}
