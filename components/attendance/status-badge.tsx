import { Badge } from '@/components/ui/badge'
import type { AttendanceStatus } from '@/lib/db/schema'

export function StatusBadge({ status }: { status: AttendanceStatus }) {
  return status === 1 ? (
    <Badge className="bg-success text-white">Present</Badge>
  ) : (
    <Badge variant="destructive">Absent</Badge>
  )
}
