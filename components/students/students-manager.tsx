'use client'

import React, { useCallback, useEffect, useState } from 'react'
import { toast } from 'sonner'
import { Barcode, Download, Edit, Plus, QrCode, RefreshCcw, Trash2, Upload } from 'lucide-react'

import {
  createStudent,
  deleteStudent,
  getCourses,
  getStudents,
  importStudentsCsv,
  updateStudent,
} from '@/lib/actions/students'
import type { StudentDoc } from '@/lib/db/schema'
import type { StudentImportSummary } from '@/lib/services/students'

import { Badge } from '@/components/ui/badge'
import { Button, buttonVariants } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { Select } from '@/components/ui/select'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'

type StudentForm = {
  student_id: string
  name: string
  course: string
}

const EMPTY_FORM: StudentForm = { student_id: '', name: '', course: '' }

function codeUrl(studentId: string, kind: 'qr' | 'barcode', download = false) {
  const base = `/api/students/${encodeURIComponent(studentId)}/codes/${kind}`
  return download ? `${base}?download=1` : base
}

export function StudentsManager({ canDelete }: { canDelete: boolean }) {
  const [loading, setLoading] = useState(true)
  const [students, setStudents] = useState<StudentDoc[]>([])
  const [courses, setCourses] = useState<string[]>([])

  const [query, setQuery] = useState('')
  const [courseFilter, setCourseFilter] = useState('all')

  const [createForm, setCreateForm] = useState<StudentForm>(EMPTY_FORM)
  const [creating, setCreating] = useState(false)

  const [editTarget, setEditTarget] = useState<string | null>(null)
  const [editForm, setEditForm] = useState<StudentForm>(EMPTY_FORM)
  const [editing, setEditing] = useState(false)

  const [importFile, setImportFile] = useState<File | null>(null)
  const [importing, setImporting] = useState(false)
  const [importSummary, setImportSummary] = useState<StudentImportSummary | null>(null)

  const [preview, setPreview] = useState<{ studentId: string; kind: 'qr' | 'barcode' } | null>(null)

  const loadCourses = useCallback(async () => {
    const result = await getCourses()
    if (!result.success) {
      toast.error('Failed to load courses', { description: result.error.message })
      setCourses([])
      return
    }
    setCourses(result.courses)
  }, [])

  const loadStudents = useCallback(async () => {
    setLoading(true)
    const result = await getStudents({ query: query.trim() || undefined, course: courseFilter })

    if (!result.success) {
      toast.error('Failed to load students', { description: result.error.message })
      setStudents([])
      setLoading(false)
      return
    }

    setStudents(result.students)
    setLoading(false)
  }, [courseFilter, query])

  const reloadAll = useCallback(async () => {
    await Promise.all([loadCourses(), loadStudents()])
  }, [loadCourses, loadStudents])

  useEffect(() => {
    void loadCourses()
  }, [loadCourses])

  useEffect(() => {
    const handle = setTimeout(() => {
      void loadStudents()
    }, 250)
    return () => clearTimeout(handle)
  }, [loadStudents])

  const handleCreate = async (e: React.FormEvent) => {
    e.preventDefault()

    if (!createForm.student_id.trim() || !createForm.name.trim()) {
      toast.error('Student ID and name are required')
      return
    }

    setCreating(true)
    const result = await createStudent(createForm)
    setCreating(false)

    if (!result.success) {
      toast.error('Failed to add student', { description: result.error.message })
      return
    }

    toast.success(`Added ${result.student.name}`)
    setCreateForm(EMPTY_FORM)
    await reloadAll()
  }

  const openEdit = (student: StudentDoc) => {
    setEditTarget(student.student_id)
    setEditForm({ student_id: student.student_id, name: student.name, course: student.course })
  }

  const handleEdit = async () => {
    if (!editTarget) return

    if (!editForm.name.trim()) {
      toast.error('Name is required')
      return
    }

    setEditing(true)
    const result = await updateStudent(editTarget, { name: editForm.name, course: editForm.course })
    setEditing(false)

    if (!result.success) {
      toast.error('Failed to update student', { description: result.error.message })
      return
    }

    toast.success('Student updated')
    setEditTarget(null)
    await reloadAll()
  }

  const handleDelete = async (student: StudentDoc) => {
    if (!window.confirm(`Delete ${student.name} (${student.student_id})? Their attendance records are kept.`)) return

    const result = await deleteStudent(student.student_id)
    if (!result.success) {
      toast.error('Failed to delete student', { description: result.error.message })
      return
    }

    toast.success('Student deleted', {
      description: result.linksRemoved ? `${result.linksRemoved} personal link(s) removed` : undefined,
    })
    await reloadAll()
  }

  const handleImport = async () => {
    if (!importFile) {
      toast.error('Select a CSV file to import')
      return
    }

    setImporting(true)
    setImportSummary(null)

    try {
      const result = await importStudentsCsv(await importFile.text())
      if (!result.success) {
        toast.error('Import failed', { description: result.error.message })
        return
      }

      setImportSummary({ inserted: result.inserted, skipped: result.skipped, errors: result.errors })

      if (result.inserted > 0) {
        toast.success(`Imported ${result.inserted} student${result.inserted === 1 ? '' : 's'}`)
        await reloadAll()
      } else {
        toast.error('No students imported', {
          description: result.errors[0]?.message ?? 'Every row was already on the roster.',
        })
      }
    } catch (error) {
      console.error('Read CSV error:', error)
      toast.error('Import failed', { description: 'Could not read the CSV file.' })
    } finally {
      setImporting(false)
    }
  }

  return (
    <div className="space-y-6">
      <div className="grid gap-6 xl:grid-cols-2">
        <Card>
          <CardHeader>
            <CardTitle>Add student</CardTitle>
            <CardDescription>Student IDs are unique across the whole system.</CardDescription>
          </CardHeader>
          <CardContent>
            <form onSubmit={handleCreate} className="grid gap-3 sm:grid-cols-3 sm:items-end">
              <div>
                <Label htmlFor="new-student-id">Student ID</Label>
                <Input
                  id="new-student-id"
                  value={createForm.student_id}
                  onChange={(e) => setCreateForm((prev) => ({ ...prev, student_id: e.target.value }))}
                />
              </div>
              <div>
                <Label htmlFor="new-student-name">Name</Label>
                <Input
                  id="new-student-name"
                  value={createForm.name}
                  onChange={(e) => setCreateForm((prev) => ({ ...prev, name: e.target.value }))}
                />
              </div>
              <div>
                <Label htmlFor="new-student-course">Course</Label>
                <Input
                  id="new-student-course"
                  list="course-options"
                  value={createForm.course}
                  onChange={(e) => setCreateForm((prev) => ({ ...prev, course: e.target.value }))}
                />
              </div>
              <Button type="submit" disabled={creating} className="sm:col-span-3 sm:w-fit">
                <Plus className="h-4 w-4" />
                {creating ? 'Adding...' : 'Add student'}
              </Button>
            </form>
            <datalist id="course-options">
              {courses.map((course) => (
                <option key={course} value={course} />
              ))}
            </datalist>
          </CardContent>
        </Card>

        <Card>
          <CardHeader>
            <CardTitle>Import and export</CardTitle>
            <CardDescription>
              CSV with a <code>student_id,name,course</code> header. Existing IDs are skipped.
            </CardDescription>
          </CardHeader>
          <CardContent className="space-y-4">
            <div className="flex flex-col gap-3 sm:flex-row sm:items-end">
              <div className="flex-1">
                <Label htmlFor="import-file">CSV file</Label>
                <Input
                  id="import-file"
                  type="file"
                  accept=".csv,text/csv"
                  onChange={(e) => setImportFile(e.target.files?.[0] ?? null)}
                />
              </div>
              <Button onClick={() => void handleImport()} disabled={importing}>
                <Upload className="h-4 w-4" />
                {importing ? 'Importing...' : 'Import'}
              </Button>
            </div>

            {importSummary && (
              <div className="rounded-xl border border-border/60 bg-muted/40 p-3 text-sm">
                <p>
                  {importSummary.inserted} inserted, {importSummary.skipped} skipped, {importSummary.errors.length}{' '}
                  with errors
                </p>
                {importSummary.errors.length > 0 && (
                  <ul className="mt-2 space-y-1 text-xs text-destructive">
                    {importSummary.errors.map((error) => (
                      <li key={`${error.row}-${error.message}`}>
                        {error.row > 0 ? `Row ${error.row}: ` : ''}
                        {error.message}
                      </li>
                    ))}
                  </ul>
                )}
              </div>
            )}

            <div className="flex flex-wrap gap-2">
              <a href="/api/export/students?format=csv" className={buttonVariants({ variant: 'outline' })}>
                <Download className="h-4 w-4" />
                Export CSV
              </a>
              <a href="/api/export/students?format=xlsx" className={buttonVariants({ variant: 'outline' })}>
                <Download className="h-4 w-4" />
                Export Excel
              </a>
            </div>
          </CardContent>
        </Card>
      </div>

      <div className="rounded-2xl border border-border/60 bg-card/70 p-4">
        <div className="flex flex-col gap-3 lg:flex-row lg:items-end">
          <div className="flex-1">
            <Label htmlFor="student-search">Search</Label>
            <Input
              id="student-search"
              placeholder="Search by student ID or name..."
              value={query}
              onChange={(e) => setQuery(e.target.value)}
            />
          </div>
          <div className="w-full lg:w-52">
            <Label htmlFor="course-filter">Course</Label>
            <Select id="course-filter" value={courseFilter} onChange={(e) => setCourseFilter(e.target.value)}>
              <option value="all">All courses</option>
              {courses.map((course) => (
                <option key={course} value={course}>
                  {course}
                </option>
              ))}
            </Select>
          </div>
          <Button variant="outline" onClick={() => void reloadAll()}>
            <RefreshCcw className="h-4 w-4" />
            Refresh
          </Button>
        </div>
      </div>

      {preview && (
        <Card>
          <CardHeader>
            <CardTitle>
              {preview.kind === 'qr' ? 'QR code' : 'Barcode'} for {preview.studentId}
            </CardTitle>
          </CardHeader>
          <CardContent className="flex flex-col items-start gap-4">
            <img
              src={codeUrl(preview.studentId, preview.kind)}
              alt={`${preview.kind} for ${preview.studentId}`}
              className="max-h-64 rounded-xl border border-border/60 bg-white p-2"
            />
            <div className="flex gap-2">
              <a href={codeUrl(preview.studentId, preview.kind, true)} className={buttonVariants()}>
                <Download className="h-4 w-4" />
                Download PNG
              </a>
              <Button variant="ghost" onClick={() => setPreview(null)}>
                Close
              </Button>
            </div>
          </CardContent>
        </Card>
      )}

      <Card>
        <CardHeader>
          <CardTitle>Roster</CardTitle>
          <CardDescription>{loading ? 'Loading...' : `${students.length} student(s)`}</CardDescription>
        </CardHeader>
        <CardContent>
          <Table>
            <TableHeader>
              <TableRow>
                <TableHead>Student ID</TableHead>
                <TableHead>Name</TableHead>
                <TableHead>Course</TableHead>
                <TableHead className="text-right">Actions</TableHead>
              </TableRow>
            </TableHeader>
            <TableBody>
              {!loading && students.length === 0 && (
                <TableRow>
                  <TableCell colSpan={4} className="text-center text-muted-foreground">
                    No students found.
                  </TableCell>
                </TableRow>
              )}
              {students.map((student) =>
                editTarget === student.student_id ? (
                  <TableRow key={student.student_id}>
                    <TableCell className="font-mono">{student.student_id}</TableCell>
                    <TableCell>
                      <Input
                        aria-label="Name"
                        value={editForm.name}
                        onChange={(e) => setEditForm((prev) => ({ ...prev, name: e.target.value }))}
                      />
                    </TableCell>
                    <TableCell>
                      <Input
                        aria-label="Course"
                        list="course-options"
                        value={editForm.course}
                        onChange={(e) => setEditForm((prev) => ({ ...prev, course: e.target.value }))}
                      />
                    </TableCell>
                    <TableCell className="space-x-2 text-right">
                      <Button size="sm" onClick={() => void handleEdit()} disabled={editing}>
                        {editing ? 'Saving...' : 'Save'}
                      </Button>
                      <Button size="sm" variant="ghost" onClick={() => setEditTarget(null)}>
                        Cancel
                      </Button>
                    </TableCell>
                  </TableRow>
                ) : (
                  <TableRow key={student.student_id}>
                    <TableCell className="font-mono">{student.student_id}</TableCell>
                    <TableCell>{student.name}</TableCell>
                    <TableCell>{student.course ? <Badge variant="secondary">{student.course}</Badge> : '-'}</TableCell>
                    <TableCell className="space-x-1 text-right">
                      <Button
                        size="icon"
                        variant="ghost"
                        title="QR code"
                        onClick={() => setPreview({ studentId: student.student_id, kind: 'qr' })}
                      >
                        <QrCode className="h-4 w-4" />
                      </Button>
                      <Button
                        size="icon"
                        variant="ghost"
                        title="Barcode"
                        onClick={() => setPreview({ studentId: student.student_id, kind: 'barcode' })}
                      >
                        <Barcode className="h-4 w-4" />
                      </Button>
                      <Button size="icon" variant="ghost" title="Edit" onClick={() => openEdit(student)}>
                        <Edit className="h-4 w-4" />
                      </Button>
                      {canDelete && (
                        <Button
                          size="icon"
                          variant="ghost"
                          title="Delete"
                          className="text-destructive"
                          onClick={() => void handleDelete(student)}
                        >
                          <Trash2 className="h-4 w-4" />
                        </Button>
                      )}
                    </TableCell>
                  </TableRow>
                )
              )}
            </TableBody>
          </Table>
        </CardContent>
      </Card>
    </div>
  )
}
