'use client'

import React, { useCallback, useEffect, useState } from 'react'
import { format, parseISO } from 'date-fns'
import { toast } from 'sonner'
import { Copy, Link2, Power } from 'lucide-react'

import {
  createSessionLink,
  createStudentLink,
  deactivateLink,
  getActiveLinks,
  type ActiveLinksResult,
} from '@/lib/actions/links'
import { getCourses, getStudents } from '@/lib/actions/students'
import type { StudentDoc } from '@/lib/db/schema'

import { Button } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { Select } from '@/components/ui/select'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'

type ActiveLinks = Extract<ActiveLinksResult, { success: true }>

const formatWhen = (iso: string) => format(parseISO(iso), 'yyyy-MM-dd HH:mm')

async function copyToClipboard(url: string) {
  try {
    await navigator.clipboard.writeText(url)
    toast.success('Link copied')
  } catch (error) {
    console.error('Copy link error:', error)
    toast.error('Could not copy the link', { description: url })
  }
}

function CreatedLink({ url }: { url: string }) {
  return (
    <div className="flex items-center gap-2 rounded-xl border border-primary/30 bg-primary/5 p-3 text-sm">
      <Link2 className="h-4 w-4 shrink-0 text-primary" />
      <a href={url} target="_blank" rel="noreferrer" className="flex-1 break-all text-primary underline">
        {url}
      </a>
      <Button size="icon" variant="ghost" title="Copy" onClick={() => void copyToClipboard(url)}>
        <Copy className="h-4 w-4" />
      </Button>
    </div>
  )
}

export function LinksManager() {
  const [students, setStudents] = useState<StudentDoc[]>([])
  const [courses, setCourses] = useState<string[]>([])
  const [active, setActive] = useState<Pick<ActiveLinks, 'sessions' | 'students'>>({ sessions: [], students: [] })

  const [sessionForm, setSessionForm] = useState({ description: '', course: '', hours: '24' })
  const [sessionUrl, setSessionUrl] = useState<string | null>(null)
  const [studentForm, setStudentForm] = useState({ studentId: '', hours: '168', maxUses: '0' })
  const [studentUrl, setStudentUrl] = useState<string | null>(null)
  const [saving, setSaving] = useState(false)

  const loadActive = useCallback(async () => {
    const result = await getActiveLinks()
    if (!result.success) {
      toast.error('Failed to load links', { description: result.error.message })
      return
    }
    setActive({ sessions: result.sessions, students: result.students })
  }, [])

  useEffect(() => {
    const loadOptions = async () => {
      const [studentsResult, coursesResult] = await Promise.all([getStudents(), getCourses()])
      if (studentsResult.success) setStudents(studentsResult.students)
      else toast.error('Failed to load students', { description: studentsResult.error.message })
      if (coursesResult.success) setCourses(coursesResult.courses)
      else toast.error('Failed to load courses', { description: coursesResult.error.message })
    }
    void loadOptions()
    void loadActive()
  }, [loadActive])

  const handleCreateSession = async (e: React.FormEvent) => {
    e.preventDefault()

    if (!sessionForm.description.trim()) {
      toast.error('Session description is required')
      return
    }

    setSaving(true)
    const result = await createSessionLink({
      description: sessionForm.description,
      course: sessionForm.course || undefined,
      durationHours: Number(sessionForm.hours),
    })
    setSaving(false)

    if (!result.success) {
      toast.error('Failed to create link', { description: result.error.message })
      return
    }

    toast.success('Session link created', { description: `Open until ${formatWhen(result.link.expires_at)}` })
    setSessionUrl(result.url)
    setSessionForm((prev) => ({ ...prev, description: '' }))
    await loadActive()
  }

  const handleCreateStudent = async (e: React.FormEvent) => {
    e.preventDefault()

    if (!studentForm.studentId) {
      toast.error('Choose a student')
      return
    }

    setSaving(true)
    const result = await createStudentLink({
      studentId: studentForm.studentId,
      durationHours: Number(studentForm.hours),
      maxUses: Number(studentForm.maxUses),
    })
    setSaving(false)

    if (!result.success) {
      toast.error('Failed to create link', { description: result.error.message })
      return
    }

    toast.success('Personal link created', { description: `Valid until ${formatWhen(result.link.expires_at)}` })
    setStudentUrl(result.url)
    await loadActive()
  }

  const handleDeactivate = async (kind: 'session' | 'student', token: string) => {
    const result = await deactivateLink(kind, token)
    if (!result.success) {
      toast.error('Failed to deactivate link', { description: result.error.message })
      return
    }
    toast.success('Link deactivated')
    await loadActive()
  }

  return (
    <div className="space-y-6">
      <div className="grid gap-6 xl:grid-cols-2">
        <Card>
          <CardHeader>
            <CardTitle>Session link</CardTitle>
            <CardDescription>Students enter their ID to check in. 1 to 168 hours.</CardDescription>
          </CardHeader>
          <CardContent className="space-y-4">
            <form onSubmit={handleCreateSession} className="grid gap-3 sm:grid-cols-2">
              <div className="sm:col-span-2">
                <Label htmlFor="session-description">Description</Label>
                <Input
                  id="session-description"
                  placeholder="Monday lecture"
                  value={sessionForm.description}
                  onChange={(e) => setSessionForm((prev) => ({ ...prev, description: e.target.value }))}
                />
              </div>
              <div>
                <Label htmlFor="session-course">Course</Label>
                <Select
                  id="session-course"
                  value={sessionForm.course}
                  onChange={(e) => setSessionForm((prev) => ({ ...prev, course: e.target.value }))}
                >
                  <option value="">Student&apos;s own course</option>
                  {courses.map((course) => (
                    <option key={course} value={course}>
                      {course}
                    </option>
                  ))}
                </Select>
              </div>
              <div>
                <Label htmlFor="session-hours">Open for (hours)</Label>
                <Input
                  id="session-hours"
                  type="number"
                  min={1}
                  max={168}
                  value={sessionForm.hours}
                  onChange={(e) => setSessionForm((prev) => ({ ...prev, hours: e.target.value }))}
                />
              </div>
              <Button type="submit" disabled={saving} className="sm:w-fit">
                Create session link
              </Button>
            </form>
            {sessionUrl && <CreatedLink url={sessionUrl} />}
          </CardContent>
        </Card>

        <Card>
          <CardHeader>
            <CardTitle>Personal link</CardTitle>
            <CardDescription>One tap checks this student in. 1 to 720 hours, 0 uses means unlimited.</CardDescription>
          </CardHeader>
          <CardContent className="space-y-4">
            <form onSubmit={handleCreateStudent} className="grid gap-3 sm:grid-cols-2">
              <div className="sm:col-span-2">
                <Label htmlFor="link-student">Student</Label>
                <Select
                  id="link-student"
                  value={studentForm.studentId}
                  onChange={(e) => setStudentForm((prev) => ({ ...prev, studentId: e.target.value }))}
                >
                  <option value="">Choose a student</option>
                  {students.map((student) => (
                    <option key={student.student_id} value={student.student_id}>
                      {student.student_id} - {student.name}
                    </option>
                  ))}
                </Select>
              </div>
              <div>
                <Label htmlFor="link-hours">Valid for (hours)</Label>
                <Input
                  id="link-hours"
                  type="number"
                  min={1}
                  max={720}
                  value={studentForm.hours}
                  onChange={(e) => setStudentForm((prev) => ({ ...prev, hours: e.target.value }))}
                />
              </div>
              <div>
                <Label htmlFor="link-uses">Maximum uses</Label>
                <Input
                  id="link-uses"
                  type="number"
                  min={0}
                  value={studentForm.maxUses}
                  onChange={(e) => setStudentForm((prev) => ({ ...prev, maxUses: e.target.value }))}
                />
              </div>
              <Button type="submit" disabled={saving} className="sm:w-fit">
                Create personal link
              </Button>
            </form>
            {studentUrl && <CreatedLink url={studentUrl} />}
          </CardContent>
        </Card>
      </div>

      <Card>
        <CardHeader>
          <CardTitle>Active session links</CardTitle>
        </CardHeader>
        <CardContent>
          <Table>
            <TableHeader>
              <TableRow>
                <TableHead>Description</TableHead>
                <TableHead>Course</TableHead>
                <TableHead>Expires</TableHead>
                <TableHead>Check-ins</TableHead>
                <TableHead className="text-right">Actions</TableHead>
              </TableRow>
            </TableHeader>
            <TableBody>
              {active.sessions.length === 0 && (
                <TableRow>
                  <TableCell colSpan={5} className="text-center text-muted-foreground">
                    No active session links.
                  </TableCell>
                </TableRow>
              )}
              {active.sessions.map((link) => (
                <TableRow key={link.session_id}>
                  <TableCell>{link.description}</TableCell>
                  <TableCell>{link.course ?? '-'}</TableCell>
                  <TableCell>{formatWhen(link.expires_at)}</TableCell>
                  <TableCell>{link.attendance_count}</TableCell>
                  <TableCell className="space-x-1 text-right">
                    <Button size="icon" variant="ghost" title="Copy link" onClick={() => void copyToClipboard(link.url)}>
                      <Copy className="h-4 w-4" />
                    </Button>
                    <Button
                      size="icon"
                      variant="ghost"
                      title="Deactivate"
                      className="text-destructive"
                      onClick={() => void handleDeactivate('session', link.session_id)}
                    >
                      <Power className="h-4 w-4" />
                    </Button>
                  </TableCell>
                </TableRow>
              ))}
            </TableBody>
          </Table>
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle>Active personal links</CardTitle>
        </CardHeader>
        <CardContent>
          <Table>
            <TableHeader>
              <TableRow>
                <TableHead>Student</TableHead>
                <TableHead>Expires</TableHead>
                <TableHead>Uses</TableHead>
                <TableHead className="text-right">Actions</TableHead>
              </TableRow>
            </TableHeader>
            <TableBody>
              {active.students.length === 0 && (
                <TableRow>
                  <TableCell colSpan={4} className="text-center text-muted-foreground">
                    No active personal links.
                  </TableCell>
                </TableRow>
              )}
              {active.students.map((link) => (
                <TableRow key={link.link_id}>
                  <TableCell>
                    {link.student_name} <span className="font-mono text-muted-foreground">({link.student_id})</span>
                  </TableCell>
                  <TableCell>{formatWhen(link.expires_at)}</TableCell>
                  <TableCell>
                    {link.uses}/{link.max_uses ?? '∞'}
                  </TableCell>
                  <TableCell className="space-x-1 text-right">
                    <Button size="icon" variant="ghost" title="Copy link" onClick={() => void copyToClipboard(link.url)}>
                      <Copy className="h-4 w-4" />
                    </Button>
                    <Button
                      size="icon"
                      variant="ghost"
                      title="Deactivate"
                      className="text-destructive"
                      onClick={() => void handleDeactivate('student', link.link_id)}
                    >
                      <Power className="h-4 w-4" />
                    </Button>
                  </TableCell>
                </TableRow>
              ))}
            </TableBody>
          </Table>
        </CardContent>
      </Card>
    </div>
  )
}
