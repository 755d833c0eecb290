'use client'

import React, { useCallback, useEffect, useMemo, useState } from 'react'
import { format, subDays } from 'date-fns'
import { toast } from 'sonner'
import { Download, RefreshCw } from 'lucide-react'

import { StatusBadge } from '@/components/attendance/status-badge'
import { buttonVariants, Button } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { Select } from '@/components/ui/select'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'
import { Tabs, TabsContent, TabsList, TabsTrigger } from '@/components/ui/tabs'
import { getAttendancePivot, getAttendanceRecords } from '@/lib/actions/attendance'
import { getCourses } from '@/lib/actions/students'
import type { AttendancePivot, AttendanceStats } from '@/lib/attendance/pivot'
import type { AttendanceRow } from '@/lib/services/attendance'
import { cn } from '@/lib/utils'

type Filters = { start: string; end: string; course: string }

const EMPTY_STATS: AttendanceStats = { present: 0, absent: 0, total: 0, rate: 0 }

function defaultFilters(): Filters {
  const today = new Date()
  return {
    start: format(subDays(today, 30), 'yyyy-MM-dd'),
    end: format(today, 'yyyy-MM-dd'),
    course: '',
  }
}

function exportHref(kind: 'records' | 'pivot', filters: Filters, fileFormat: 'csv' | 'xlsx') {
  const params = new URLSearchParams({ start: filters.start, end: filters.end, format: fileFormat })
  if (filters.course) params.set('course', filters.course)
  return `/api/export/${kind}?${params.toString()}`
}

export function RecordsManager() {
  const [view, setView] = useState('records')
  const [courses, setCourses] = useState<string[]>([])
  const [draft, setDraft] = useState<Filters>(defaultFilters)
  const [filters, setFilters] = useState<Filters>(draft)
  const [loading, setLoading] = useState(true)

  const [rows, setRows] = useState<AttendanceRow[]>([])
  const [stats, setStats] = useState<AttendanceStats>(EMPTY_STATS)
  const [pivot, setPivot] = useState<AttendancePivot>({ dates: [], rows: [] })

  const load = useCallback(async () => {
    setLoading(true)
    const params = { start: filters.start, end: filters.end, course: filters.course || undefined }
    const [recordsResult, pivotResult] = await Promise.all([getAttendanceRecords(params), getAttendancePivot(params)])
    setLoading(false)

    if (!recordsResult.success) {
      toast.error('Failed to load records', { description: recordsResult.error.message })
      setRows([])
      setStats(EMPTY_STATS)
    } else {
      setRows(recordsResult.rows)
      setStats(recordsResult.stats)
    }

    if (!pivotResult.success) {
      toast.error('Failed to build the day view', { description: pivotResult.error.message })
      setPivot({ dates: [], rows: [] })
    } else {
      setPivot(pivotResult.pivot)
    }
  }, [filters])

  useEffect(() => {
    void load()
  }, [load])

  useEffect(() => {
    const loadCourses = async () => {
      const result = await getCourses()
      if (!result.success) {
        toast.error('Failed to load courses', { description: result.error.message })
        return
      }
      setCourses(result.courses)
    }
    void loadCourses()
  }, [])

  const presentByDate = useMemo(() => {
    const totals: Record<string, number> = {}
    for (const date of pivot.dates) {
      totals[date] = pivot.rows.filter((row) => row.values[date] === 1).length
    }
    return totals
  }, [pivot])

  const handleApply = (e: React.FormEvent) => {
    e.preventDefault()
    if (draft.start > draft.end) {
      toast.error('Start date must be on or before the end date.')
      return
    }
    setFilters({ ...draft })
  }

  const exportKind = view === 'pivot' ? 'pivot' : 'records'

  return (
    <div className="space-y-6">
      <Card>
        <CardContent className="pt-6">
          <form onSubmit={handleApply} className="grid gap-3 sm:grid-cols-2 lg:grid-cols-[1fr_1fr_1fr_auto] lg:items-end">
            <div>
              <Label htmlFor="records-start">From</Label>
              <Input
                id="records-start"
                type="date"
                value={draft.start}
                onChange={(e) => setDraft((prev) => ({ ...prev, start: e.target.value }))}
              />
            </div>
            <div>
              <Label htmlFor="records-end">To</Label>
              <Input
                id="records-end"
                type="date"
                value={draft.end}
                onChange={(e) => setDraft((prev) => ({ ...prev, end: e.target.value }))}
              />
            </div>
            <div>
              <Label htmlFor="records-course">Course</Label>
              <Select
                id="records-course"
                value={draft.course}
                onChange={(e) => setDraft((prev) => ({ ...prev, course: e.target.value }))}
              >
                <option value="">All courses</option>
                {courses.map((course) => (
                  <option key={course} value={course}>
                    {course}
                  </option>
                ))}
              </Select>
            </div>
            <Button type="submit" disabled={loading}>
              <RefreshCw className={cn('mr-2 h-4 w-4', loading && 'animate-spin')} />
              Apply
            </Button>
          </form>
        </CardContent>
      </Card>

      <section className="grid gap-4 sm:grid-cols-4">
        {[
          { label: 'Records', value: stats.total },
          { label: 'Present', value: stats.present },
          { label: 'Absent', value: stats.absent },
          { label: 'Attendance rate', value: `${stats.rate}%` },
        ].map((item) => (
          <Card key={item.label}>
            <CardHeader className="pb-2">
              <CardDescription>{item.label}</CardDescription>
              <CardTitle className="text-3xl">{item.value}</CardTitle>
            </CardHeader>
          </Card>
        ))}
      </section>

      <Tabs value={view} onValueChange={setView} className="space-y-4">
        <div className="flex flex-wrap items-center justify-between gap-3">
          <TabsList>
            <TabsTrigger value="records">Records</TabsTrigger>
            <TabsTrigger value="pivot">By day</TabsTrigger>
          </TabsList>
          <div className="flex gap-2">
            <a href={exportHref(exportKind, filters, 'csv')} className={buttonVariants({ variant: 'outline', size: 'sm' })}>
              <Download className="mr-2 h-4 w-4" />
              CSV
            </a>
            <a href={exportHref(exportKind, filters, 'xlsx')} className={buttonVariants({ variant: 'outline', size: 'sm' })}>
              <Download className="mr-2 h-4 w-4" />
              Excel
            </a>
          </div>
        </div>

        <TabsContent value="records">
          <Card>
            <CardContent className="pt-6">
              <Table>
                <TableHeader>
                  <TableRow>
                    <TableHead>Date</TableHead>
                    <TableHead>Time</TableHead>
                    <TableHead>Student ID</TableHead>
                    <TableHead>Name</TableHead>
                    <TableHead>Course</TableHead>
                    <TableHead>Status</TableHead>
                    <TableHead>Method</TableHead>
                  </TableRow>
                </TableHeader>
                <TableBody>
                  {!loading && rows.length === 0 && (
                    <TableRow>
                      <TableCell colSpan={7} className="text-center text-muted-foreground">
                        No attendance records in this range.
                      </TableCell>
                    </TableRow>
                  )}
                  {rows.map((row) => (
                    <TableRow key={`${row.date}-${row.student_id}-${row.time}`}>
                      <TableCell>{row.date}</TableCell>
                      <TableCell className="font-mono text-xs">{row.time}</TableCell>
                      <TableCell className="font-mono">{row.student_id}</TableCell>
                      <TableCell>{row.name}</TableCell>
                      <TableCell>{row.course || '-'}</TableCell>
                      <TableCell>
                        <StatusBadge status={row.status} />
                      </TableCell>
                      <TableCell className="text-muted-foreground">{row.method.replace(/_/g, ' ')}</TableCell>
                    </TableRow>
                  ))}
                </TableBody>
              </Table>
            </CardContent>
          </Card>
        </TabsContent>

        <TabsContent value="pivot">
          <Card>
            <CardHeader>
              <CardTitle>Presence by day</CardTitle>
              <CardDescription>1 marks a student present that day; anything else counts as absent.</CardDescription>
            </CardHeader>
            <CardContent className="overflow-x-auto">
              <Table>
                <TableHeader>
                  <TableRow>
                    <TableHead className="sticky left-0 bg-card">Student</TableHead>
                    {pivot.dates.map((date) => (
                      <TableHead key={date} className="text-center font-mono text-xs">
                        {date.slice(5)}
                      </TableHead>
                    ))}
                  </TableRow>
                </TableHeader>
                <TableBody>
                  {pivot.rows.map((row) => (
                    <TableRow key={row.student_id}>
                      <TableCell className="sticky left-0 bg-card whitespace-nowrap">
                        {row.name} <span className="font-mono text-xs text-muted-foreground">({row.student_id})</span>
                      </TableCell>
                      {pivot.dates.map((date) => (
                        <TableCell
                          key={date}
                          className={cn('text-center font-mono', row.values[date] === 1 ? 'text-success' : 'text-muted-foreground')}
                        >
                          {row.values[date] ?? 0}
                        </TableCell>
                      ))}
                    </TableRow>
                  ))}
                  {pivot.rows.length > 0 && (
                    <TableRow>
                      <TableCell className="sticky left-0 bg-card font-medium">Present</TableCell>
                      {pivot.dates.map((date) => (
                        <TableCell key={date} className="text-center font-medium">
                          {presentByDate[date]}
                        </TableCell>
                      ))}
                    </TableRow>
                  )}
                </TableBody>
              </Table>
            </CardContent>
          </Card>
        </TabsContent>
      </Tabs>
    </div>
  )
}
