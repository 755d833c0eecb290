import { redirect } from 'next/navigation'

import { PageIntro } from '@/components/dashboard/page-intro'
import { StudentsManager } from '@/components/students/students-manager'
import { getCurrentUser } from '@/lib/auth'

export const metadata = {
  title: 'Students - Attendance Tracker',
}

export default async function StudentsPage() {
  const user = await getCurrentUser()
  if (!user) redirect('/auth')

  return (
    <div className="space-y-8">
      <PageIntro
        eyebrow="Roster"
        title="Students"
        description="Add students one by one or from a CSV file, and print their QR codes and barcodes."
      />

      <StudentsManager canDelete={user.role === 'admin'} />
    </div>
  )
}
