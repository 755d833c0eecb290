import React from 'react'
import { redirect } from 'next/navigation'

import { DashboardHeader } from '@/components/dashboard/header'
import { DashboardNav } from '@/components/dashboard/nav'
import { getCurrentUser } from '@/lib/auth'

export const metadata = {
  title: 'Dashboard - Attendance Tracker',
}

export default async function DashboardLayout({ children }: { children: React.ReactNode }) {
  const user = await getCurrentUser()

  if (!user) {
    redirect('/auth')
  }

  return (
    <div className="flex min-h-screen">
      <DashboardNav user={user} />
      <div className="flex min-w-0 flex-1 flex-col">
        <DashboardHeader user={user} />
        <main className="flex-1 px-4 py-6 sm:px-6 lg:px-10">
          <div className="mx-auto w-full max-w-[1500px] space-y-6">{children}</div>
        </main>
      </div>
    </div>
  )
}
