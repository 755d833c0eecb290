import { ResetPasswordForm } from './reset-password-form'

export const metadata = {
  title: 'Reset password - Attendance Tracker',
}

export default async function ResetPasswordPage({
  searchParams,
}: {
  searchParams: Promise<{ token?: string }>
}) {
  const { token } = await searchParams

  return (
    <div className="flex min-h-screen items-center justify-center bg-gradient-to-br from-slate-900 to-slate-800 p-4">
      <ResetPasswordForm token={token ?? ''} />
    </div>
  )
}
