import type { Metadata, Viewport } from 'next'
import './globals.css'
import RegionNav from '@/components/RegionNav'

export const metadata: Metadata = {
  title: 'River Graphs',
  description: 'Seven-day hydrographs for Colorado, Wyoming and West Virginia river gages',
}

export const viewport: Viewport = {
  width: 'device-width',
  initialScale: 1,
}

export default function RootLayout({
  children,
}: {
  children: React.ReactNode
}) {
  return (
    <html lang="en">
      <body>
        <header className="site-header">
          <h1>River Graphs</h1>
          <RegionNav />
        </header>
        <main>{children}</main>
      </body>
    </html>
  )
}
