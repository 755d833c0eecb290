'use client'

import React, { useEffect, useRef, useState } from 'react'
import { toast } from 'sonner'
import { CheckCircle2, ScanLine, XCircle } from 'lucide-react'

import { scanStudentCode } from '@/lib/actions/attendance'

import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Input } from '@/components/ui/input'

type ScanEntry = {
  id: number
  code: string
  ok: boolean
  message: string
  time: string
}

const MAX_HISTORY = 20

export function ScanStation() {
  const inputRef = useRef<HTMLInputElement>(null)
  const counter = useRef(0)
  const [code, setCode] = useState('')
  const [busy, setBusy] = useState(false)
  const [history, setHistory] = useState<ScanEntry[]>([])

  useEffect(() => {
    inputRef.current?.focus()
  }, [])

  const pushHistory = (entry: Omit<ScanEntry, 'id' | 'time'>) => {
    counter.current += 1
    const time = new Date().toLocaleTimeString()
    setHistory((prev) => [{ ...entry, id: counter.current, time }, ...prev].slice(0, MAX_HISTORY))
  }

  // Scanners type the code and press Enter
  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault()
    const scanned = code.trim()
    if (!scanned || busy) return

    setBusy(true)
    setCode('')

    try {
      const result = await scanStudentCode(scanned)
      if (!result.success) {
        toast.error('Scan rejected', { description: result.error.message })
        pushHistory({ code: scanned, ok: false, message: result.error.message })
        return
      }

      toast.success(`${result.student.name} marked present`)
      pushHistory({ code: scanned, ok: true, message: `${result.student.name} marked present` })
    } finally {
      setBusy(false)
      inputRef.current?.focus()
    }
  }

  return (
    <div className="grid gap-6 lg:grid-cols-[1fr_1fr]">
      <Card>
        <CardHeader>
          <CardTitle className="flex items-center gap-2">
            <ScanLine className="h-5 w-5" />
            Scanner input
          </CardTitle>
          <CardDescription>Keep this field focused while scanning.</CardDescription>
        </CardHeader>
        <CardContent>
          <form onSubmit={handleSubmit}>
            <Input
              ref={inputRef}
              value={code}
              onChange={(e) => setCode(e.target.value)}
              placeholder="Waiting for scan..."
              autoComplete="off"
              className="h-14 font-mono text-lg"
              aria-label="Scanned student code"
            />
          </form>
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle>Recent scans</CardTitle>
          <CardDescription>This station, newest first</CardDescription>
        </CardHeader>
        <CardContent className="space-y-2">
          {history.length === 0 && <p className="text-sm text-muted-foreground">No scans yet.</p>}
          {history.map((entry) => (
            <div
              key={entry.id}
              className="flex items-center justify-between rounded-xl border border-border/60 bg-background/70 px-4 py-2 text-sm"
            >
              <div className="flex items-center gap-3">
                {entry.ok ? (
                  <CheckCircle2 className="h-4 w-4 text-success" />
                ) : (
                  <XCircle className="h-4 w-4 text-destructive" />
                )}
                <span className="font-mono">{entry.code}</span>
                <span className="text-muted-foreground">{entry.message}</span>
              </div>
              <span className="text-xs text-muted-foreground">{entry.time}</span>
            </div>
          ))}
        </CardContent>
      </Card>
    </div>
  )
}
