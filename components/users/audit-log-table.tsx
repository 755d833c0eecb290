'use client'

import { useCallback, useEffect, useState } from 'react'
import { toast } from 'sonner'

import { getAuditLogs } from '@/lib/actions/audit'
import type { AuditLogDoc } from '@/lib/db/schema'

import { Badge } from '@/components/ui/badge'
import { Button } from '@/components/ui/button'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'

function describeChanges(changes: AuditLogDoc['changes']) {
  const entries = Object.entries(changes)
  if (entries.length === 0) return '-'
  return entries.map(([key, value]) => `${key}: ${value === null ? 'none' : String(value)}`).join(', ')
}

export function AuditLogTable({ limit = 100 }: { limit?: number }) {
  const [loading, setLoading] = useState(true)
  const [logs, setLogs] = useState<AuditLogDoc[]>([])

  const load = useCallback(async () => {
    setLoading(true)
    const result = await getAuditLogs({ limit })
    if (!result.success) {
      toast.error('Failed to load audit logs', { description: result.error.message })
      setLogs([])
      setLoading(false)
      return
    }
    setLogs(result.logs)
    setLoading(false)
  }, [limit])

  useEffect(() => {
    void load()
  }, [load])

  return (
    <div className="space-y-4">
      <div className="flex justify-end">
        <Button variant="outline" onClick={() => void load()} disabled={loading}>
          Refresh
        </Button>
      </div>

      {loading ? (
        <div className="rounded-2xl border border-border/60 bg-card/70 py-10 text-center text-muted-foreground">
          Loading audit logs...
        </div>
      ) : logs.length === 0 ? (
        <div className="rounded-2xl border border-dashed border-border/70 bg-card/40 py-12 text-center">
          <p className="text-muted-foreground">No audit activity yet.</p>
        </div>
      ) : (
        <div className="overflow-hidden rounded-2xl border border-border/60 bg-card/80">
          <Table>
            <TableHeader>
              <TableRow>
                <TableHead>Time</TableHead>
                <TableHead>Actor</TableHead>
                <TableHead>Action</TableHead>
                <TableHead>Resource</TableHead>
                <TableHead>Changes</TableHead>
              </TableRow>
            </TableHeader>
            <TableBody>
              {logs.map((row) => (
                <TableRow key={row.id}>
                  <TableCell className="text-sm text-muted-foreground">{new Date(row.created_at).toLocaleString()}</TableCell>
                  <TableCell className="text-sm font-medium">{row.actor}</TableCell>
                  <TableCell className="text-sm">
                    <Badge variant="outline">{row.action}</Badge>
                  </TableCell>
                  <TableCell className="text-sm text-muted-foreground">
                    {row.resource_type}
                    {row.resource_id ? <span className="font-mono"> / {row.resource_id}</span> : null}
                  </TableCell>
                  <TableCell className="max-w-xs truncate text-xs text-muted-foreground">
                    {describeChanges(row.changes)}
                  </TableCell>
                </TableRow>
              ))}
            </TableBody>
          </Table>
        </div>
      )}
    </div>
  )
}
