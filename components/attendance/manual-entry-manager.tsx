'use client'

import React, { useCallback, useEffect, useState } from 'react'
import { format } from 'date-fns'
import { toast } from 'sonner'
import { RefreshCcw } from 'lucide-react'

import { getDayAttendance, markAttendance, updateAttendanceStatus } from '@/lib/actions/attendance'
import { getCourses, getStudents } from '@/lib/actions/students'
import type { AttendanceStatus, StudentDoc } from '@/lib/db/schema'
import type { DayAttendance } from '@/lib/services/attendance'

import { Button } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { Select } from '@/components/ui/select'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'
import { Tabs, TabsContent, TabsList, TabsTrigger } from '@/components/ui/tabs'

import { StatusBadge } from './status-badge'

const today = () => format(new Date(), 'yyyy-MM-dd')

function toStatus(value: string): AttendanceStatus {
  return value === '0' ? 0 : 1
}

export function ManualEntryManager() {
  const [tab, setTab] = useState('new')
  const [students, setStudents] = useState<StudentDoc[]>([])
  const [courses, setCourses] = useState<string[]>([])

  const loadOptions = useCallback(async () => {
    const [studentsResult, coursesResult] = await Promise.all([getStudents(), getCourses()])

    if (!studentsResult.success) {
      toast.error('Failed to load students', { description: studentsResult.error.message })
    } else {
      setStudents(studentsResult.students)
    }

    if (!coursesResult.success) {
      toast.error('Failed to load courses', { description: coursesResult.error.message })
    } else {
      setCourses(coursesResult.courses)
    }
  }, [])

  useEffect(() => {
    void loadOptions()
  }, [loadOptions])

  return (
    <Tabs value={tab} onValueChange={setTab} className="space-y-4">
      <TabsList>
        <TabsTrigger value="new">New entry</TabsTrigger>
        <TabsTrigger value="edit">Edit a day</TabsTrigger>
      </TabsList>
      <TabsContent value="new">
        <NewEntryForm students={students} courses={courses} />
      </TabsContent>
      <TabsContent value="edit">
        <DayEditor courses={courses} />
      </TabsContent>
    </Tabs>
  )
}

function NewEntryForm({ students, courses }: { students: StudentDoc[]; courses: string[] }) {
  const [studentId, setStudentId] = useState('')
  const [status, setStatus] = useState<AttendanceStatus>(1)
  const [date, setDate] = useState(today)
  const [course, setCourse] = useState('')
  const [saving, setSaving] = useState(false)

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault()

    if (!studentId) {
      toast.error('Choose a student')
      return
    }

    setSaving(true)
    const result = await markAttendance({ studentId, status, date, course: course || undefined })
    setSaving(false)

    if (!result.success) {
      toast.error('Failed to mark attendance', { description: result.error.message })
      return
    }

    toast.success(`${result.student.name} marked ${result.record.status === 1 ? 'present' : 'absent'}`, {
      description: `${result.record.date} at ${result.record.time}`,
    })
    setStudentId('')
  }

  return (
    <Card>
      <CardHeader>
        <CardTitle>Mark one student</CardTitle>
        <CardDescription>A student can have one record per day.</CardDescription>
      </CardHeader>
      <CardContent>
        <form onSubmit={handleSubmit} className="grid gap-4 md:grid-cols-2 xl:grid-cols-4 xl:items-end">
          <div>
            <Label htmlFor="manual-student">Student</Label>
            <Select id="manual-student" value={studentId} onChange={(e) => setStudentId(e.target.value)}>
              <option value="">Choose a student</option>
              {students.map((student) => (
                <option key={student.student_id} value={student.student_id}>
                  {student.student_id} - {student.name}
                </option>
              ))}
            </Select>
          </div>
          <div>
            <Label htmlFor="manual-status">Status</Label>
            <Select id="manual-status" value={String(status)} onChange={(e) => setStatus(toStatus(e.target.value))}>
              <option value="1">Present</option>
              <option value="0">Absent</option>
            </Select>
          </div>
          <div>
            <Label htmlFor="manual-date">Date</Label>
            <Input id="manual-date" type="date" value={date} onChange={(e) => setDate(e.target.value)} />
          </div>
          <div>
            <Label htmlFor="manual-course">Course (optional override)</Label>
            <Input
              id="manual-course"
              list="manual-course-options"
              value={course}
              onChange={(e) => setCourse(e.target.value)}
            />
            <datalist id="manual-course-options">
              {courses.map((option) => (
                <option key={option} value={option} />
              ))}
            </datalist>
          </div>
          <Button type="submit" disabled={saving} className="md:col-span-2 xl:col-span-4 xl:w-fit">
            {saving ? 'Saving...' : 'Mark attendance'}
          </Button>
        </form>
      </CardContent>
    </Card>
  )
}

function DayEditor({ courses }: { courses: string[] }) {
  const [date, setDate] = useState(today)
  const [course, setCourse] = useState('all')
  const [entries, setEntries] = useState<DayAttendance[]>([])
  const [loading, setLoading] = useState(true)
  const [savingId, setSavingId] = useState<string | null>(null)

  const loadDay = useCallback(async () => {
    setLoading(true)
    const result = await getDayAttendance({ date, course })
    setLoading(false)

    if (!result.success) {
      toast.error('Failed to load the day', { description: result.error.message })
      setEntries([])
      return
    }
    setEntries(result.entries)
  }, [course, date])

  useEffect(() => {
    void loadDay()
  }, [loadDay])

  const handleUpdate = async (studentId: string, status: AttendanceStatus) => {
    setSavingId(studentId)
    const result = await updateAttendanceStatus({ studentId, date, status })
    setSavingId(null)

    if (!result.success) {
      toast.error('Failed to update record', { description: result.error.message })
      return
    }
    toast.success('Record updated')
    await loadDay()
  }

  const handleAdd = async (studentId: string, status: AttendanceStatus) => {
    setSavingId(studentId)
    const result = await markAttendance({ studentId, status, date, fromEditView: true })
    setSavingId(null)

    if (!result.success) {
      toast.error('Failed to add record', { description: result.error.message })
      return
    }
    toast.success('Record added')
    await loadDay()
  }

  return (
    <Card>
      <CardHeader>
        <CardTitle>Edit a day</CardTitle>
        <CardDescription>Change existing records or add the ones that are missing.</CardDescription>
      </CardHeader>
      <CardContent className="space-y-4">
        <div className="flex flex-col gap-3 md:flex-row md:items-end">
          <div>
            <Label htmlFor="edit-date">Date</Label>
            <Input id="edit-date" type="date" value={date} onChange={(e) => setDate(e.target.value)} />
          </div>
          <div className="md:w-52">
            <Label htmlFor="edit-course">Course</Label>
            <Select id="edit-course" value={course} onChange={(e) => setCourse(e.target.value)}>
              <option value="all">All courses</option>
              {courses.map((option) => (
                <option key={option} value={option}>
                  {option}
                </option>
              ))}
            </Select>
          </div>
          <Button variant="outline" onClick={() => void loadDay()}>
            <RefreshCcw className="h-4 w-4" />
            Reload
          </Button>
        </div>

        <Table>
          <TableHeader>
            <TableRow>
              <TableHead>Student ID</TableHead>
              <TableHead>Name</TableHead>
              <TableHead>Course</TableHead>
              <TableHead>Status</TableHead>
              <TableHead>Last change</TableHead>
              <TableHead className="text-right">Actions</TableHead>
            </TableRow>
          </TableHeader>
          <TableBody>
            {!loading && entries.length === 0 && (
              <TableRow>
                <TableCell colSpan={6} className="text-center text-muted-foreground">
                  No students for this selection.
                </TableCell>
              </TableRow>
            )}
            {entries.map(({ student, record }) => (
              <TableRow key={student.student_id}>
                <TableCell className="font-mono">{student.student_id}</TableCell>
                <TableCell>{student.name}</TableCell>
                <TableCell>{record?.course ?? student.course}</TableCell>
                <TableCell>
                  {record ? <StatusBadge status={record.status} /> : <span className="text-muted-foreground">No record</span>}
                </TableCell>
                <TableCell className="text-xs text-muted-foreground">
                  {!record ? '-' : record.modified_by ? `edited by ${record.modified_by}` : `marked at ${record.time}`}
                </TableCell>
                <TableCell className="space-x-2 text-right">
                  {record ? (
                    <Button
                      size="sm"
                      variant="outline"
                      disabled={savingId === student.student_id}
                      onClick={() => void handleUpdate(student.student_id, record.status === 1 ? 0 : 1)}
                    >
                      Mark {record.status === 1 ? 'absent' : 'present'}
                    </Button>
                  ) : (
                    <>
                      <Button
                        size="sm"
                        disabled={savingId === student.student_id}
                        onClick={() => void handleAdd(student.student_id, 1)}
                      >
                        Present
                      </Button>
                      <Button
                        size="sm"
                        variant="outline"
                        disabled={savingId === student.student_id}
                        onClick={() => void handleAdd(student.student_id, 0)}
                      >
                        Absent
                      </Button>
                    </>
                  )}
                </TableCell>
              </TableRow>
            ))}
          </TableBody>
        </Table>
      </CardContent>
    </Card>
  )
}
