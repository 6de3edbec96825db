import RiverList from '@/components/RiverList';
import { getServerConfig } from '@/lib/config';
import { getDashboardRivers } from '@/services/dashboard';

// Gage files change under the server every few minutes
export const dynamic = 'force-dynamic';

export default async function Home() {
  const rivers = await getDashboardRivers(getServerConfig());
  return <RiverList rivers={rivers} />;
}
