import type { Metadata } from 'next'
import './globals.css'
import '@/components/bottom-drawer/BottomDrawer.scss'

export const metadata: Metadata = {
  title: 'Bottom Drawer',
  description: 'Draggable bottom drawer that snaps to configured stops',
}

export default function RootLayout({
  children,
}: {
  children: React.ReactNode
}) {
  return (
    <html lang="en">
      <body className="antialiased">
        {children}
      </body>
    </html>
  )
}
