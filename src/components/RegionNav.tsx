'use client';

import Link from 'next/link';
import { usePathname } from 'next/navigation';
import { REGIONS } from '@/data/regions';

export default function RegionNav() {
  const pathname = usePathname();

  const links = [
    { href: '/', title: 'All' },
    ...REGIONS.map(region => ({ href: `/${region.slug}`, title: region.title })),
  ];

  return (
    <nav className="region-nav">
      {links.map(link => (
        <Link
          key={link.href}
          href={link.href}
          className={pathname === link.href ? 'active' : undefined}
        >
          {link.title}
        </Link>
      ))}
    </nav>
  );
}
