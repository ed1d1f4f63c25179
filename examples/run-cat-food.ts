import { main } from './cat-food'

main()
