import { RankingChart } from "@/components/ranking-chart"

export default function HomePage() {
  return (
    <main className="mx-auto min-h-screen max-w-7xl p-6">
      <RankingChart />
    </main>
  )
}
