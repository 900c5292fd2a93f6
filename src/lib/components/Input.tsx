import React from 'react'
import { cn } from '../design/utils'

const FIELD = 'w-full px-4 py-2.5 rounded-[10px] text-sm glass-input placeholder:text-white/50 focus:outline-none'

export interface InputProps extends React.InputHTMLAttributes<HTMLInputElement> {
  /** Called with the current value on blur and on Enter */
  onCommit?: (value: string) => void
}

export const Input = React.forwardRef<HTMLInputElement, InputProps>(
  ({ className, onCommit, onBlur, onKeyDown, ...props }, ref) => (
    <input
      ref={ref}
      className={cn(FIELD, className)}
      onBlur={(e) => {
        onCommit?.(e.currentTarget.value)
        onBlur?.(e)
      }}
      onKeyDown={(e) => {
        if (e.key === 'Enter') onCommit?.(e.currentTarget.value)
        onKeyDown?.(e)
      }}
      {...props}
    />
  )
)

Input.displayName = 'Input'

export type TextareaProps = React.TextareaHTMLAttributes<HTMLTextAreaElement>

export const Textarea = React.forwardRef<HTMLTextAreaElement, TextareaProps>(
  ({ className, ...props }, ref) => (
    <textarea ref={ref} className={cn(FIELD, 'resize-none', className)} {...props} />
  )
)

Textarea.displayName = 'Textarea'
