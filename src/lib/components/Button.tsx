import React from 'react'
import { cn } from '../design/utils'

export interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: 'primary' | 'secondary' | 'icon'
}

const VARIANTS = {
  primary: 'glass-btn-primary rounded-[10px] h-10 px-4 text-sm gap-2',
  secondary: 'glass-btn-secondary rounded-[10px] h-10 px-4 text-sm gap-2',
  icon: 'glass-btn-ghost rounded-[8px] h-10 w-10 p-0',
}

export const Button = React.forwardRef<HTMLButtonElement, ButtonProps>(
  ({ className, variant = 'primary', type = 'button', ...props }, ref) => (
    <button
      ref={ref}
      type={type}
      className={cn(
        'inline-flex items-center justify-center font-medium transition-all duration-200',
        'focus:outline-none focus-visible:ring-2 focus-visible:ring-white/40',
        'disabled:opacity-50 disabled:cursor-not-allowed',
        VARIANTS[variant],
        className
      )}
      {...props}
    />
  )
)

Button.displayName = 'Button'
