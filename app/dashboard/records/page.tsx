import { redirect } from 'next/navigation'

import { PageIntro } from '@/components/dashboard/page-intro'
import { RecordsManager } from '@/components/records/records-manager'
import { getCurrentUser } from '@/lib/auth'

export const metadata = {
  title: 'Records - Attendance Tracker',
}

export default async function RecordsPage() {
  const user = await getCurrentUser()
  if (!user) redirect('/auth')

  return (
    <div className="space-y-8">
      <PageIntro
        eyebrow="Reports"
        title="Attendance Records"
        description="Browse marks over a date range, see who attended each day, and export to CSV or Excel."
      />

      <RecordsManager />
    </div>
  )
}
