import type { Metadata } from "next"
import "./globals.css"

export const metadata: Metadata = {
  title: "Tonearm",
  description: "Control playback across your speakers",
}

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode
}>) {
  return (
    <html lang="en" className="dark overflow-hidden h-full">
      <body
        className="antialiased bg-black text-white h-full overflow-hidden font-sans"
      >
        {children}
      </body>
    </html>
  )
}
