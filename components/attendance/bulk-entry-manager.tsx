'use client'

import { useCallback, useEffect, useMemo, useState } from 'react'
import { format } from 'date-fns'
import { toast } from 'sonner'

import { bulkMarkAttendance } from '@/lib/actions/attendance'
import { getCourses, getStudents } from '@/lib/actions/students'
import type { AttendanceStatus, StudentDoc } from '@/lib/db/schema'

import { Button } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { Select } from '@/components/ui/select'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'

export function BulkEntryManager() {
  const [date, setDate] = useState(() => format(new Date(), 'yyyy-MM-dd'))
  const [course, setCourse] = useState('all')
  const [courses, setCourses] = useState<string[]>([])
  const [students, setStudents] = useState<StudentDoc[]>([])
  const [absent, setAbsent] = useState<Set<string>>(new Set())
  const [loading, setLoading] = useState(true)
  const [saving, setSaving] = useState(false)

  useEffect(() => {
    const load = async () => {
      const result = await getCourses()
      if (!result.success) {
        toast.error('Failed to load courses', { description: result.error.message })
        return
      }
      setCourses(result.courses)
    }
    void load()
  }, [])

  const loadStudents = useCallback(async () => {
    setLoading(true)
    const result = await getStudents({ course })
    setLoading(false)

    if (!result.success) {
      toast.error('Failed to load students', { description: result.error.message })
      setStudents([])
      return
    }
    setStudents(result.students)
    setAbsent(new Set())
  }, [course])

  useEffect(() => {
    void loadStudents()
  }, [loadStudents])

  const presentCount = useMemo(() => students.length - absent.size, [students, absent])

  const toggle = (studentId: string) => {
    setAbsent((prev) => {
      const next = new Set(prev)
      if (next.has(studentId)) next.delete(studentId)
      else next.add(studentId)
      return next
    })
  }

  const handleSubmit = async () => {
    if (students.length === 0) {
      toast.error('No students to mark')
      return
    }

    setSaving(true)
    const result = await bulkMarkAttendance({
      date,
      records: students.map((student) => {
        const status: AttendanceStatus = absent.has(student.student_id) ? 0 : 1
        return { student_id: student.student_id, status }
      }),
    })
    setSaving(false)

    if (!result.success) {
      toast.error('Bulk entry failed', { description: result.error.message })
      return
    }

    toast.success(`Marked ${result.marked} student${result.marked === 1 ? '' : 's'}`, {
      description: [
        result.already ? `${result.already} already had a record for ${date}` : null,
        result.errors.length ? result.errors.join(' ') : null,
      ]
        .filter(Boolean)
        .join('. ') || undefined,
    })
  }

  return (
    <Card>
      <CardHeader>
        <CardTitle>Roster for {date}</CardTitle>
        <CardDescription>
          {loading ? 'Loading...' : `${presentCount} present, ${absent.size} absent of ${students.length}`}
        </CardDescription>
      </CardHeader>
      <CardContent className="space-y-4">
        <div className="flex flex-col gap-3 md:flex-row md:items-end">
          <div>
            <Label htmlFor="bulk-date">Date</Label>
            <Input id="bulk-date" type="date" value={date} onChange={(e) => setDate(e.target.value)} />
          </div>
          <div className="md:w-52">
            <Label htmlFor="bulk-course">Course</Label>
            <Select id="bulk-course" value={course} onChange={(e) => setCourse(e.target.value)}>
              <option value="all">All courses</option>
              {courses.map((option) => (
                <option key={option} value={option}>
                  {option}
                </option>
              ))}
            </Select>
          </div>
          <Button onClick={() => void handleSubmit()} disabled={saving || loading}>
            {saving ? 'Saving...' : 'Save attendance'}
          </Button>
        </div>

        <Table>
          <TableHeader>
            <TableRow>
              <TableHead className="w-20">Present</TableHead>
              <TableHead>Student ID</TableHead>
              <TableHead>Name</TableHead>
              <TableHead>Course</TableHead>
            </TableRow>
          </TableHeader>
          <TableBody>
            {students.map((student) => (
              <TableRow key={student.student_id}>
                <TableCell>
                  <input
                    type="checkbox"
                    className="h-4 w-4 accent-primary"
                    aria-label={`${student.name} present`}
                    checked={!absent.has(student.student_id)}
                    onChange={() => toggle(student.student_id)}
                  />
                </TableCell>
                <TableCell className="font-mono">{student.student_id}</TableCell>
                <TableCell>{student.name}</TableCell>
                <TableCell>{student.course || '-'}</TableCell>
              </TableRow>
            ))}
          </TableBody>
        </Table>
      </CardContent>
    </Card>
  )
}
