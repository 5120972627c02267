import 'dotenv/config';
import moduleAlias from 'module-alias';

moduleAlias.addAlias('@', __dirname);
