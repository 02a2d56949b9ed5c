import './globals.css';
import type { Metadata } from 'next';

export const metadata: Metadata = {
  title: 'Drop Zone - Drone Bomber Arcade',
  description: 'Fly a drone over moving targets and time your bombs to land where they will be.',
  openGraph: {
    title: 'Drop Zone',
    description: 'Fly a drone over moving targets and time your bombs to land where they will be.',
    type: 'website',
  },
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body className="bg-brutal-black text-white antialiased overflow-x-hidden">
        {children}
      </body>
    </html>
  );
}
