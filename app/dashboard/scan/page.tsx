import { redirect } from 'next/navigation'

import { ScanStation } from '@/components/attendance/scan-station'
import { PageIntro } from '@/components/dashboard/page-intro'
import { getCurrentUser } from '@/lib/auth'

export const metadata = {
  title: 'Scan - Attendance Tracker',
}

export default async function ScanPage() {
  const user = await getCurrentUser()
  if (!user) redirect('/auth')

  return (
    <div className="space-y-8">
      <PageIntro
        eyebrow="Daily Operations"
        title="Scan"
        description="Point a USB or Bluetooth scanner at a student's QR code or barcode. Each scan marks the student present for today."
      />

      <ScanStation />
    </div>
  )
}
