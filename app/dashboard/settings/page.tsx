import { redirect } from 'next/navigation'

import { PageIntro } from '@/components/dashboard/page-intro'
import { UnlockSection } from '@/components/dashboard/unlock-section'
import { SettingsManager } from '@/components/settings/settings-manager'
import { getCurrentUser } from '@/lib/auth'
import { isUnlocked } from '@/lib/guards'

export const metadata = {
  title: 'Settings - Attendance Tracker',
}

export default async function SettingsPage() {
  const user = await getCurrentUser()
  if (!user) redirect('/auth')

  return (
    <div className="space-y-8">
      <PageIntro eyebrow="Configuration" title="Settings" description="Your account and the storage this app runs on." />

      {isUnlocked(user, 'settings') ? (
        <SettingsManager user={{ username: user.username, name: user.name, email: user.email, role: user.role }} />
      ) : (
        <UnlockSection section="settings" title="Settings" />
      )}
    </div>
  )
}
